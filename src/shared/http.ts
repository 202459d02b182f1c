import { RateLimitError, RelayError, SourceError, errorMessage } from './errors.js';

export interface HttpOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
}

export interface TextResponse {
  status: number;
  contentType: string;
  body: string;
}

/**
 * Run `read` against the response while the timeout is still armed, so a
 * body that stalls after the headers is aborted too.
 */
async function request<T>(
  url: string,
  method: 'GET' | 'HEAD',
  options: HttpOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method,
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? '*/*',
      },
      signal: controller.signal,
      redirect: 'follow',
    });
    return await read(response);
  } catch (err) {
    if (err instanceof RelayError) throw err;
    if (controller.signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
      throw new SourceError(`Request timed out after ${options.timeoutMs}ms: ${url}`, {
        url,
        timeout: options.timeoutMs,
      });
    }
    throw new SourceError(`Request failed: ${errorMessage(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * GET a text resource. Throws RateLimitError on 429 and SourceError on any
 * other non-2xx status, transport failure or timeout (body included).
 */
export async function fetchText(url: string, options: HttpOptions): Promise<TextResponse> {
  return request(url, 'GET', options, async (response) => {
    if (response.status === 429) {
      await response.body?.cancel();
      throw new RateLimitError(`Rate limited by ${new URL(url).host}`, response.headers.get('retry-after'), {
        url,
      });
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new SourceError(`Fetch failed: ${response.status} from ${url}`, {
        url,
        status: response.status,
      });
    }

    return {
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      body: await response.text(),
    };
  });
}

/**
 * Status of a HEAD request, retried as GET when the origin refuses HEAD.
 * Transport failures and timeouts propagate as SourceError.
 */
export async function probeStatus(url: string, options: HttpOptions): Promise<number> {
  const status = await request(url, 'HEAD', options, async (head) => head.status);
  if (status !== 405 && status !== 501) return status;

  return request(url, 'GET', options, async (get) => {
    // Only the status matters; release the body.
    await get.body?.cancel();
    return get.status;
  });
}
