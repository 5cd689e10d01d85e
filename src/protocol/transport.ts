import { LIMITS } from '../config/defaults.js';
import { ProtocolError } from '../errors/index.js';
import { envelopeSchema, httpMethodSchema } from '../schema/protocol.js';
import type { Envelope, HttpMethod } from '../schema/protocol.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { classifyError } from './classifier.js';

// ── Public types ─────────────────────────────────────────────

export interface TransportOptions {
  baseUrl?: string | undefined;
  logger?: Logger | undefined;
  maxRedirects?: number | undefined;
  fetch?: typeof fetch | undefined;
}

export interface RequestOptions {
  /** Substituted, URI-encoded, into the `%s` placeholders of the template. */
  params?: readonly string[] | undefined;
  body?: unknown;
}

export interface TransportResult {
  /** Meaningful only for session creation; `''` when the server sent none. */
  sessionId: string;
  /** Raw payload; decoding into a shape is the caller's job. */
  value: unknown;
}

// ── Helpers ──────────────────────────────────────────────────

const REQUEST_HEADERS = {
  Accept: 'application/json',
  'Accept-Charset': 'utf-8',
} as const;

const JSON_CONTENT_TYPE = 'application/json;charset=utf-8';

export function formatPath(template: string, params: readonly string[]): string {
  const pieces = template.split('%s');
  if (pieces.length - 1 !== params.length) {
    throw new ProtocolError(
      `path template "${template}" expects ${String(pieces.length - 1)} parameters, got ${String(params.length)}`,
    );
  }
  return pieces.reduce(
    (acc, piece, i) => acc + encodeURIComponent(params[i - 1] ?? '') + piece,
  );
}

function isRedirect(status: number): boolean {
  return status === 302 || status === 303;
}

function normalizeSessionId(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (raw === null || raw === undefined) return '';
  return JSON.stringify(raw).replace(/^[{}"]+|[{}"]+$/g, '');
}

function head(text: string): string {
  if (text.length <= LIMITS.LOGGED_BODY_CHARS) return text;
  const rest = text.length - LIMITS.LOGGED_BODY_CHARS;
  return `${text.slice(0, LIMITS.LOGGED_BODY_CHARS)} ...${String(rest)} more chars`;
}

function decodeEnvelope(text: string): Envelope | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = envelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ── Transport ────────────────────────────────────────────────

/**
 * Sends protocol commands to one driver endpoint.
 * Stateless apart from the base URL; safe to share between every
 * session, window and element of a driver.
 */
export class Transport {
  url: string;
  private readonly logger: Logger;
  private readonly maxRedirects: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TransportOptions = {}) {
    this.url = options.baseUrl ?? '';
    this.logger = options.logger ?? silentLogger;
    this.maxRedirects = options.maxRedirects ?? LIMITS.MAX_REDIRECTS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async execute(
    method: string,
    template: string,
    options: RequestOptions = {},
  ): Promise<TransportResult> {
    const checked = httpMethodSchema.safeParse(method);
    if (!checked.success) {
      throw new ProtocolError(`invalid method: ${method}`);
    }
    if (this.url === '') {
      throw new ProtocolError('transport has no base url (driver not started?)');
    }

    const url = this.url + formatPath(template, options.params ?? []);
    return this.send(checked.data, url, options.body);
  }

  private async send(
    method: HttpMethod,
    initialUrl: string,
    body: unknown,
  ): Promise<TransportResult> {
    let currentMethod = method;
    let url = initialUrl;
    let payload = body;

    for (let redirects = 0; ; redirects++) {
      const response = await this.fetchOnce(currentMethod, url, payload);

      // fetch does not follow POST redirects here; session creation relies on it.
      if (isRedirect(response.status)) {
        if (redirects >= this.maxRedirects) {
          throw new ProtocolError(
            `too many redirects (${String(this.maxRedirects)}) starting at ${initialUrl}`,
          );
        }
        const location = response.headers.get('location');
        if (location === null) {
          throw new ProtocolError(
            `redirect ${String(response.status)} without a Location header from ${url}`,
          );
        }
        await response.body?.cancel();
        url = new URL(location, url).toString();
        currentMethod = 'GET';
        payload = undefined;
        this.logger.debug('following redirect', { location: url });
        continue;
      }

      return this.decode(response);
    }
  }

  private async fetchOnce(
    method: HttpMethod,
    url: string,
    body: unknown,
  ): Promise<Response> {
    this.logger.debug(`>> ${method} ${url}`);

    const init: RequestInit = {
      method,
      headers: REQUEST_HEADERS,
      redirect: 'manual',
    };
    if (method === 'POST') {
      init.headers = { ...REQUEST_HEADERS, 'Content-Type': JSON_CONTENT_TYPE };
      init.body = JSON.stringify(body ?? {});
    }

    const response = await this.fetchImpl(url, init);
    this.logger.debug('response', { status: response.status });
    return response;
  }

  private async decode(response: Response): Promise<TransportResult> {
    const text = await response.text();
    this.logger.debug(`<< ${head(text)}`);

    const decoded = decodeEnvelope(text);
    if (decoded === null && response.status === 200) {
      throw new ProtocolError('response must be a JSON object');
    }
    const envelope: Envelope = decoded ?? { status: 0 };

    if (response.status >= 400 || envelope.status !== 0) {
      throw classifyError(response.status, envelope);
    }

    return {
      sessionId: normalizeSessionId(envelope.sessionId),
      value: envelope.value ?? null,
    };
  }
}
