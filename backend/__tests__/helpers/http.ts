import http from 'http';
import { Express } from 'express';
import { JsonValue } from '../../src/types/Delivery';

export interface TestResponse {
  status: number;
  body: JsonValue;
}

/** Sends one request to the app on an ephemeral port and closes the listener afterwards. */
export function makeRequest(app: Express, method: string, path: string, body?: object): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, () => {
      const addr = server.address();
      if (addr === null || typeof addr === 'string') {
        server.close();
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }

      const req = http.request(
        {
          hostname: '127.0.0.1',
          port: addr.port,
          path,
          method: method.toUpperCase(),
          headers: { 'Content-Type': 'application/json' },
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () => {
            server.close();
            const text = Buffer.concat(chunks).toString();
            let parsed: JsonValue = text;
            if ((res.headers['content-type'] || '').includes('json')) {
              parsed = JSON.parse(text);
            }
            resolve({ status: res.statusCode ?? 0, body: parsed });
          });
        },
      );
      req.on('error', (err) => {
        server.close();
        reject(err);
      });

      if (body) {
        req.write(JSON.stringify(body));
      }
      req.end();
    });
  });
}
