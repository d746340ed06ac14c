import { basename, posix } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { TestJob } from '../types/Delivery';
import { isJsonFilename, isValidTestId } from '../utils/validation';

export function createTestJob(
  localPath: string,
  configDir: string,
  options: { testId?: string; createdAt?: Date } = {},
): TestJob {
  const fileName = basename(localPath);
  if (!isJsonFilename(fileName)) {
    throw new Error(`Invalid test file name "${fileName}" (expected a .json file)`);
  }
  const testId = options.testId ?? uuidv4();
  if (!isValidTestId(testId)) {
    throw new Error(`Invalid test id "${testId}"`);
  }

  return Object.freeze({
    test_id: testId,
    file_name: fileName,
    local_path: localPath,
    remote_path: posix.join(configDir, fileName),
    created_at: (options.createdAt ?? new Date()).toISOString(),
  });
}
