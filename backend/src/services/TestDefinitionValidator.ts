import { existsSync, readFileSync, statSync } from 'fs';
import { JsonObject, JsonValue } from '../types/Delivery';

export const MAX_DEFINITION_BYTES = 1024 * 1024;

export interface ValidationResult {
  valid: boolean;
  error: string;
  data: JsonObject | null;
}

export interface TestImpacts {
  affects_wan: boolean;
  affects_lan: boolean;
}

const DISRUPTIVE_ACTIONS = ['delete', 'remove', 'disable', 'stop'];
const RESTART_ACTIONS = ['restart', 'reload', 'reset'];

function invalid(error: string): ValidationResult {
  return { valid: false, error, data: null };
}

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function testCases(data: JsonObject): JsonObject[] {
  const cases = data.test_cases;
  return Array.isArray(cases) ? cases.filter(isObject) : [];
}

function lowerField(obj: JsonObject, key: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value.toLowerCase() : '';
}

export function validateTestDefinitionText(text: string): ValidationResult {
  let data: JsonValue;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return invalid(`Invalid JSON format: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isObject(data)) {
    return invalid('Root element must be an object');
  }
  if (!('test_cases' in data)) {
    return invalid("Missing 'test_cases' array");
  }
  const cases = data.test_cases;
  if (!Array.isArray(cases)) {
    return invalid("'test_cases' must be an array");
  }
  if (cases.length === 0) {
    return invalid('No test cases found');
  }

  for (let i = 0; i < cases.length; i++) {
    const testCase = cases[i];
    if (!isObject(testCase)) {
      return invalid(`Test case #${i} must be an object`);
    }
    if (!('service' in testCase)) {
      return invalid(`Test case #${i} missing 'service' field`);
    }
    const service = testCase.service;
    if (typeof service !== 'string' || !service.trim()) {
      return invalid(`Test case #${i} 'service' must be a non-empty string`);
    }
  }

  return { valid: true, error: '', data };
}

export function validateTestDefinition(filePath: string): ValidationResult {
  if (!existsSync(filePath)) {
    return invalid('File does not exist');
  }
  const size = statSync(filePath).size;
  if (size > MAX_DEFINITION_BYTES) {
    return invalid('File size exceeds 1MB limit');
  }
  if (size === 0) {
    return invalid('File is empty');
  }
  return validateTestDefinitionText(readFileSync(filePath, 'utf-8'));
}

/** Flags test definitions that may cut the device's WAN or LAN link while they run. */
export function analyzeTestImpacts(data: JsonObject): TestImpacts {
  const impacts: TestImpacts = { affects_wan: false, affects_lan: false };

  for (const testCase of testCases(data)) {
    const service = lowerField(testCase, 'service');
    const action = lowerField(testCase, 'action');

    if (service === 'wan' && DISRUPTIVE_ACTIONS.includes(action)) {
      impacts.affects_wan = true;
    }
    if (service === 'lan' && DISRUPTIVE_ACTIONS.includes(action)) {
      impacts.affects_lan = true;
    }
    if ((service === 'network' || service === 'networking') && RESTART_ACTIONS.includes(action)) {
      impacts.affects_wan = true;
      impacts.affects_lan = true;
    }
  }

  return impacts;
}

export function countTestCases(data: JsonObject): number {
  const cases = data.test_cases;
  return Array.isArray(cases) ? cases.length : 0;
}

export function summarizeTestCases(data: JsonObject): string {
  const counts = new Map<string, number>();
  for (const testCase of testCases(data)) {
    const value = testCase.service;
    const service = typeof value === 'string' ? value : 'unknown';
    counts.set(service, (counts.get(service) || 0) + 1);
  }
  return [...counts.entries()].map(([service, count]) => `${service}(${count})`).join(', ');
}
