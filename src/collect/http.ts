import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

/**
 * Typed result of one GET. `empty` is final (nothing to collect there);
 * `failed` is a transport or protocol failure that a caller may retry.
 */
export type FetchOutcome =
  | { kind: 'ok'; url: string; status: number; contentType: string; body: string }
  | {
      kind: 'empty';
      url: string;
      status: number;
      reason: 'not_found' | 'no_content' | 'not_modified' | 'unsupported_type';
    }
  | { kind: 'failed'; url: string; error: SourceError; retryable: boolean };

export interface GetOptions {
  /**
   * Content-type fragments accepted as `ok`; any other declared type is `empty` / `unsupported_type`.
   * A response without a Content-Type header is accepted.
   */
  accept?: string[];
  /** Minimum spacing between two requests to the same host. */
  delayMs?: number;
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  maxRetries: number;
  retryBaseMs?: number;
}

const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Spaces out requests per host. Each call reserves the next slot, so concurrent
 * callers against one host are serialized at `delayMs` intervals.
 */
export class HostThrottle {
  private readonly nextSlot = new Map<string, number>();

  async wait(url: string, delayMs: number, signal?: AbortSignal): Promise<void> {
    if (delayMs <= 0) return;
    let host: string;
    try {
      host = new URL(url).host;
    } catch {
      return;
    }
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + delayMs);
    await sleep(slot - now, signal);
  }
}

export class HttpClient {
  private readonly throttle = new HostThrottle();

  constructor(private readonly options: HttpClientOptions) {}

  /**
   * GET with retries on retryable failures. Never throws for transport problems;
   * the outcome says what happened.
   */
  async get(url: string, opts: GetOptions = {}): Promise<FetchOutcome> {
    const retryBase = this.options.retryBaseMs ?? 500;
    let outcome = await this.attempt(url, opts);
    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      if (outcome.kind !== 'failed' || !outcome.retryable || opts.signal?.aborted) break;
      logger.debug({ url, attempt, error: outcome.error.message }, 'Retrying request');
      await sleep(retryBase * 2 ** (attempt - 1), opts.signal);
      outcome = await this.attempt(url, opts);
    }
    return outcome;
  }

  private async attempt(url: string, opts: GetOptions): Promise<FetchOutcome> {
    await this.throttle.wait(url, opts.delayMs ?? 0, opts.signal);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = (): void => controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: opts.accept?.join(', ') ?? '*/*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status === 204) return { kind: 'empty', url, status: 204, reason: 'no_content' };
      if (response.status === 304) return { kind: 'empty', url, status: 304, reason: 'not_modified' };
      if (response.status === 404 || response.status === 410) {
        return { kind: 'empty', url, status: response.status, reason: 'not_found' };
      }
      if (!response.ok) {
        return {
          kind: 'failed',
          url,
          retryable: RETRYABLE_STATUS.has(response.status) || response.status >= 500,
          error: new SourceError(`HTTP ${response.status} from ${url}`, { url, status: response.status }),
        };
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (opts.accept && contentType && !opts.accept.some((a) => contentType.toLowerCase().includes(a))) {
        return { kind: 'empty', url, status: response.status, reason: 'unsupported_type' };
      }

      const raw = new Uint8Array(await response.arrayBuffer());
      return { kind: 'ok', url, status: response.status, contentType, body: decodeBody(raw, contentType) };
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'AbortError' && !opts.signal?.aborted;
      const message = timedOut
        ? `Request timed out after ${this.options.timeoutMs}ms: ${url}`
        : `Request failed: ${err instanceof Error ? err.message : String(err)}`;
      return {
        kind: 'failed',
        url,
        retryable: !opts.signal?.aborted,
        error: new SourceError(message, { url }),
      };
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}

const ENCODING_ALIASES: Record<string, string> = {
  shiftjis: 'shift_jis',
  sjis: 'shift_jis',
  windows31j: 'shift_jis',
  cp932: 'shift_jis',
  xsjis: 'shift_jis',
  eucjp: 'euc-jp',
  utf8: 'utf-8',
};

export function normalizeEncoding(label: string | undefined): string | undefined {
  if (!label) return undefined;
  const key = label.trim().toLowerCase().replace(/[_-]/g, '');
  if (!key) return undefined;
  return ENCODING_ALIASES[key] ?? label.trim().toLowerCase();
}

function sniffMetaCharset(raw: Uint8Array): string | undefined {
  // The <meta charset> declaration is ASCII, so a latin1 view of the head is enough
  const head = Buffer.from(raw.subarray(0, 4096)).toString('latin1');
  const meta = /<meta[^>]*charset=["']?\s*([a-zA-Z0-9_-]+)/i.exec(head);
  return normalizeEncoding(meta?.[1]);
}

/**
 * Decode a response body: charset from the Content-Type header, then from <meta>,
 * then UTF-8, Shift_JIS and EUC-JP in turn. Falls back to lossy UTF-8.
 */
export function decodeBody(raw: Uint8Array, contentType: string): string {
  const headerCharset = normalizeEncoding(/charset\s*=\s*["']?([^;"'\s]+)/i.exec(contentType)?.[1]);
  const candidates: string[] = [];
  for (const enc of [headerCharset, sniffMetaCharset(raw), 'utf-8', 'shift_jis', 'euc-jp']) {
    if (enc && !candidates.includes(enc)) candidates.push(enc);
  }

  for (const enc of candidates) {
    try {
      return new TextDecoder(enc, { fatal: true }).decode(raw);
    } catch {
      // unknown label or invalid bytes for this encoding: try the next candidate
    }
  }
  return new TextDecoder('utf-8').decode(raw);
}
