export type RecordedGenerateRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
};

export type FakeGenerateEndpointOptions = {
  /** Reply text, or a function of the received prompt. */
  reply?: string | ((prompt: string) => string);
  /** Answer every request with this HTTP status and body instead of a reply. */
  failWith?: { status: number; body?: string };
  /** Reject like undici does when nothing listens on the port. */
  unreachable?: boolean;
  /** Raw body to return with a 200, bypassing the reply. */
  rawBody?: string;
};

export type FakeGenerateEndpoint = {
  fetcher: (input: string | URL, init?: RequestInit) => Promise<Response>;
  requests: RecordedGenerateRequest[];
};

function readPrompt(body: unknown): string {
  if (body && typeof body === 'object' && 'prompt' in body && typeof body.prompt === 'string') {
    return body.prompt;
  }
  return '';
}

function parseBody(body: RequestInit['body']): unknown {
  if (typeof body !== 'string') {
    return body ?? null;
  }
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

function normalizeHeaders(headers: RequestInit['headers']): Record<string, string> {
  return Object.fromEntries(new Headers(headers).entries());
}

/**
 * In-process stand-in for the local generate endpoint, shaped like a `fetch` implementation.
 */
export function createFakeGenerateEndpoint(options: FakeGenerateEndpointOptions = {}): FakeGenerateEndpoint {
  const requests: RecordedGenerateRequest[] = [];

  return {
    requests,
    async fetcher(input, init) {
      const body = parseBody(init?.body);
      requests.push({
        url: String(input),
        method: init?.method ?? 'GET',
        headers: normalizeHeaders(init?.headers),
        body,
      });

      if (options.unreachable) {
        const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' });
        throw new TypeError('fetch failed', { cause });
      }
      if (options.failWith) {
        return new Response(options.failWith.body ?? '', { status: options.failWith.status });
      }
      if (options.rawBody !== undefined) {
        return new Response(options.rawBody, { status: 200, headers: { 'Content-Type': 'application/json' } });
      }

      const prompt = readPrompt(body);
      const reply = typeof options.reply === 'function' ? options.reply(prompt) : options.reply ?? 'ok';
      return Response.json({ model: 'test-model', response: reply, done: true });
    },
  };
}
