// Shared plumbing for the in-process HTTP fakes

export type FetchInput = string | URL | Request;

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  body: Buffer;
}

export interface InjectedFailure {
  pattern: RegExp;
  remaining: number;
  respond: () => Response;
}

export function requestUrl(input: FetchInput): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

export function requestBody(init?: RequestInit): Buffer {
  const body = init?.body;
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  return Buffer.alloc(0);
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(text, { status, headers });
}

/**
 * Base for fakes that record every request and can be told to fail the next
 * matching ones
 */
export abstract class FakeServer {
  readonly requests: RecordedRequest[] = [];
  private readonly failures: InjectedFailure[] = [];

  /**
   * Answer the next `times` requests whose URL matches with `respond`;
   * `respond` may throw to simulate a network failure
   */
  failNext(pattern: RegExp, respond: () => Response, times = 1): void {
    this.failures.push({ pattern, remaining: times, respond });
  }

  install(): jest.SpyInstance {
    return jest
      .spyOn(global, 'fetch')
      .mockImplementation((input: FetchInput, init?: RequestInit) => this.handle(input, init));
  }

  requestsMatching(pattern: RegExp): RecordedRequest[] {
    return this.requests.filter((request) => pattern.test(request.url));
  }

  async handle(input: FetchInput, init?: RequestInit): Promise<Response> {
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: requestUrl(input),
      headers: new Headers(init?.headers),
      body: requestBody(init),
    };
    this.requests.push(request);

    const failure = this.failures.find((candidate) => candidate.remaining > 0 && candidate.pattern.test(request.url));
    if (failure) {
      failure.remaining--;
      return failure.respond();
    }

    return this.route(request);
  }

  protected abstract route(request: RecordedRequest): Response;
}
