import { GenerationError, type ChatLogger } from '@profile-chat/chat-contract';

export const DEFAULT_GENERATE_ENDPOINT = 'http://localhost:11434/api/generate';
export const DEFAULT_GENERATE_MODEL = 'gemma3';

export type Fetcher = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type GenerateRequest = {
  prompt: string;
  model: string;
  signal?: AbortSignal;
  stage?: string;
};

export type GenerateClient = {
  endpoint: string;
  generate: (request: GenerateRequest) => Promise<string>;
};

export type GenerateClientOptions = {
  endpoint?: string;
  fetcher?: Fetcher;
  logger?: ChatLogger;
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function readCauseCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return readCauseCode(error.cause);
  return undefined;
}

/**
 * undici rejects with `TypeError('fetch failed')` for socket-level problems and carries the
 * system error code on `cause`. A rejection without a response is treated as "cannot connect"
 * unless it is an abort or a malformed URL.
 */
export function isConnectionFailure(error: unknown): boolean {
  const code = readCauseCode(error);
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return true;
  }
  if (code === 'ERR_INVALID_URL') {
    return false;
  }
  return error instanceof TypeError && error.message === 'fetch failed';
}

function extractResponseText(body: unknown): string | undefined {
  if (body && typeof body === 'object' && 'response' in body && typeof body.response === 'string') {
    return body.response;
  }
  return undefined;
}

export function buildUnreachableMessage(endpoint: string, model: string): string {
  return `Could not connect to the generation server at ${endpoint}. Make sure Ollama is running (\`ollama serve\`) and the ${model} model is pulled (\`ollama pull ${model}\`).`;
}

export function createGenerateClient(options: GenerateClientOptions = {}): GenerateClient {
  const endpoint = options.endpoint ?? DEFAULT_GENERATE_ENDPOINT;
  const fetcher: Fetcher = options.fetcher ?? ((input, init) => globalThis.fetch(input, init));

  return {
    endpoint,
    async generate(request): Promise<string> {
      const stage = request.stage ?? 'answer';
      const startedAt = Date.now();
      options.logger?.('llm.request', {
        endpoint,
        stage,
        model: request.model,
        promptChars: request.prompt.length,
      });

      let response: Response;
      try {
        response = await fetcher(endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model: request.model, prompt: request.prompt, stream: false }),
          signal: request.signal,
        });
      } catch (error) {
        const failure = isConnectionFailure(error)
          ? new GenerationError('endpoint_unreachable', buildUnreachableMessage(endpoint, request.model), {
              cause: error,
            })
          : new GenerationError('endpoint_request_error', `Error calling the generation endpoint: ${String(error)}.`, {
              cause: error,
            });
        options.logger?.('llm.request.error', { endpoint, stage, code: failure.code, error: String(error) });
        throw failure;
      }

      if (!response.ok) {
        const detail = (await response.text().catch(() => '')).trim();
        const failure = new GenerationError(
          'endpoint_request_error',
          `Error calling the generation endpoint: HTTP ${response.status}${detail ? ` (${detail})` : ''}. Check the server logs for details.`,
          { status: response.status }
        );
        options.logger?.('llm.request.error', { endpoint, stage, code: failure.code, status: response.status });
        throw failure;
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        options.logger?.('llm.request.error', { endpoint, stage, code: 'endpoint_request_error', error: String(error) });
        throw new GenerationError('endpoint_request_error', 'The generation endpoint returned a body that is not JSON.', {
          cause: error,
          status: response.status,
        });
      }

      const text = extractResponseText(body);
      if (text === undefined) {
        options.logger?.('llm.request.error', { endpoint, stage, code: 'endpoint_request_error', reason: 'missing_response' });
        throw new GenerationError('endpoint_request_error', 'The generation endpoint reply has no "response" field.', {
          status: response.status,
        });
      }

      options.logger?.('llm.response', {
        endpoint,
        stage,
        model: request.model,
        responseChars: text.length,
        durationMs: Date.now() - startedAt,
      });
      return text;
    },
  };
}
