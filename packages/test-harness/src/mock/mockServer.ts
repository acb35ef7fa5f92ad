import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { URL } from 'url';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: IncomingMessage['headers'];
  body: string;
}

export interface MockServerOptions {
  chatReply?: string;
  generateReply?: string;
  transcript?: string;
  // Respond to chat completions with this status and error body instead.
  chatStatus?: number;
  chatError?: string;
}

const readBody = (req: IncomingMessage) =>
  new Promise<string>((resolve, reject) => {
    let body = Buffer.alloc(0);
    req.on('data', (chunk: Buffer) => {
      body = Buffer.concat([body, chunk]);
    });
    req.on('end', () => resolve(body.toString('utf-8')));
    req.on('error', reject);
  });

const sendJson = (res: ServerResponse, status: number, payload: unknown) => {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
};

/**
 * In-process stand-in for an OpenAI-compatible server: chat completions,
 * the /api/generate fallback and audio transcriptions.
 */
export const startMockLlmServer = async (options: MockServerOptions = {}) => {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    readBody(req)
      .then((body) => {
        requests.push({ method: req.method ?? 'GET', path: url.pathname, headers: req.headers, body });
        if (req.method !== 'POST') {
          sendJson(res, 404, { error: { message: 'not found' } });
          return;
        }
        if (url.pathname.endsWith('/chat/completions')) {
          if (options.chatStatus) {
            sendJson(res, options.chatStatus, { error: { message: options.chatError ?? 'mock failure' } });
            return;
          }
          sendJson(res, 200, {
            choices: [{ message: { role: 'assistant', content: options.chatReply ?? 'mock reply' } }],
          });
          return;
        }
        if (url.pathname === '/api/generate') {
          sendJson(res, 200, { response: options.generateReply ?? 'mock generated' });
          return;
        }
        if (url.pathname === '/v1/audio/transcriptions') {
          res.statusCode = 200;
          res.setHeader('Content-Type', 'text/plain');
          res.end(options.transcript ?? 'mock transcript');
          return;
        }
        sendJson(res, 404, { error: { message: 'not found' } });
      })
      .catch((error: unknown) => {
        sendJson(res, 500, { error: { message: error instanceof Error ? error.message : String(error) } });
      });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Unable to start mock server');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const close = async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { baseUrl, requests, close };
};
