import { failureDetailSchema } from '../schema/protocol.js';
import type { Envelope, StackFrame } from '../schema/protocol.js';

// ── Status code table ─────────────────────────────────────────

export interface StatusCodeInfo {
  readonly name: string;
  readonly description: string;
}

export const STATUS_CODES: Readonly<Record<number, StatusCodeInfo>> = {
  0: { name: 'success', description: 'The command executed successfully.' },
  6: { name: 'no such driver', description: 'A session is either terminated or not started.' },
  7: {
    name: 'element not found',
    description: 'An element could not be located on the page using the given search parameters.',
  },
  8: {
    name: 'frame not found',
    description:
      'A request to switch to a frame could not be satisfied because the frame could not be found.',
  },
  9: {
    name: 'unknown command',
    description:
      'The requested resource could not be found, or a request was received using an HTTP method that is not supported by the mapped resource.',
  },
  10: {
    name: 'stale element reference',
    description:
      'An element command failed because the referenced element is no longer attached to the DOM.',
  },
  11: {
    name: 'element not visible',
    description:
      'An element command could not be completed because the element is not visible on the page.',
  },
  12: {
    name: 'invalid element state',
    description:
      'An element command could not be completed because the element is in an invalid state (e.g. attempting to click a disabled element).',
  },
  13: {
    name: 'unknown error',
    description: 'An unknown server-side error occurred while processing the command.',
  },
  15: {
    name: 'element not selectable',
    description: 'An attempt was made to select an element that cannot be selected.',
  },
  17: {
    name: 'javascript error',
    description: 'An error occurred while executing user supplied JavaScript.',
  },
  19: {
    name: 'xpath lookup error',
    description: 'An error occurred while searching for an element by XPath.',
  },
  21: {
    name: 'operation timeout',
    description: 'An operation did not complete before its timeout expired.',
  },
  23: {
    name: 'window not found',
    description:
      'A request to switch to a different window could not be satisfied because the window could not be found.',
  },
  24: {
    name: 'invalid cookie domain',
    description:
      'An illegal attempt was made to set a cookie under a different domain than the current page.',
  },
  25: {
    name: 'unable to set cookie',
    description: "A request to set a cookie's value could not be satisfied.",
  },
  26: {
    name: 'unexpected alert open',
    description: 'A modal dialog was open, blocking this operation.',
  },
  27: {
    name: 'no alert open',
    description: 'An attempt was made to operate on a modal dialog when one was not open.',
  },
  28: {
    name: 'script timeout',
    description: 'A script did not complete before its timeout expired.',
  },
  29: {
    name: 'invalid element coordinates',
    description: 'The coordinates provided to an interactions operation are invalid.',
  },
  30: { name: 'ime not available', description: 'IME was not available.' },
  31: {
    name: 'ime engine activation failed',
    description: 'An IME engine could not be started.',
  },
  32: {
    name: 'invalid selector',
    description: 'Argument was an invalid selector (e.g. XPath/CSS).',
  },
  33: { name: 'session not created', description: 'A new session could not be created.' },
  34: {
    name: 'move target out of bounds',
    description: 'Target provided for a move action is out of bounds.',
  },
};

export const STATUS = {
  SUCCESS: 0,
  NO_SUCH_DRIVER: 6,
  NO_SUCH_ELEMENT: 7,
  NO_SUCH_FRAME: 8,
  UNKNOWN_COMMAND: 9,
  STALE_ELEMENT_REFERENCE: 10,
  ELEMENT_NOT_VISIBLE: 11,
  INVALID_ELEMENT_STATE: 12,
  UNKNOWN_ERROR: 13,
  ELEMENT_IS_NOT_SELECTABLE: 15,
  JAVASCRIPT_ERROR: 17,
  XPATH_LOOKUP_ERROR: 19,
  TIMEOUT: 21,
  NO_SUCH_WINDOW: 23,
  INVALID_COOKIE_DOMAIN: 24,
  UNABLE_TO_SET_COOKIE: 25,
  UNEXPECTED_ALERT_OPEN: 26,
  NO_ALERT_OPEN: 27,
  SCRIPT_TIMEOUT: 28,
  INVALID_ELEMENT_COORDINATES: 29,
  IME_NOT_AVAILABLE: 30,
  IME_ENGINE_ACTIVATION_FAILED: 31,
  INVALID_SELECTOR: 32,
  SESSION_NOT_CREATED: 33,
  MOVE_TARGET_OUT_OF_BOUNDS: 34,
} as const;

/** Status code carried when the server gave none (HTTP-level failure). */
export const STATUS_NOT_SPECIFIED = -1;

export function describeStatus(code: number): StatusCodeInfo | undefined {
  return STATUS_CODES[code];
}

// ── HTTP category table ───────────────────────────────────────

const HTTP_CATEGORIES: Readonly<Record<number, string>> = {
  // Some drivers answer 200 on failures; no category then.
  200: '',
  400: '400: Missing Command Parameters',
  404: '404: Unknown command/Resource Not Found',
  405: '405: Invalid Command Method',
  500: '500: Failed Command',
  501: '501: Unimplemented Command',
};

export function httpCategory(httpStatus: number): string {
  return HTTP_CATEGORIES[httpStatus] ?? 'unknown error';
}

// ── CommandError ──────────────────────────────────────────────

export interface CommandErrorInit {
  code: number;
  category?: string | undefined;
  detail?: string | undefined;
  screen?: string | undefined;
  className?: string | undefined;
  stackTrace?: readonly StackFrame[] | undefined;
}

function renderMessage(category: string, code: number, detail: string): string {
  const head = category !== '' ? `${category}: ` : '';
  if (code === STATUS_NOT_SPECIFIED) {
    return `${head}status code not specified`;
  }
  const info = describeStatus(code);
  if (info) {
    return `${head}${info.description}: ${detail}`;
  }
  return `${head}unknown status code (${String(code)}): ${detail}`;
}

/** A command the server reported as failed. */
export class CommandError extends Error {
  readonly code: number;
  readonly category: string;
  readonly detail: string;
  readonly screen: string | undefined;
  readonly className: string | undefined;
  readonly stackTrace: readonly StackFrame[];

  constructor(init: CommandErrorInit) {
    const category = init.category ?? '';
    const detail = init.detail ?? '';
    super(renderMessage(category, init.code, detail));
    this.name = 'CommandError';
    this.code = init.code;
    this.category = category;
    this.detail = detail;
    this.screen = init.screen;
    this.className = init.className;
    this.stackTrace = init.stackTrace ?? [];
  }

  /** Server-reported operation or script timeout. */
  get isTimeout(): boolean {
    return this.code === STATUS.TIMEOUT || this.code === STATUS.SCRIPT_TIMEOUT;
  }

  get statusName(): string {
    return describeStatus(this.code)?.name ?? 'unknown';
  }
}

// ── Classifier ────────────────────────────────────────────────

function rawText(value: unknown): string {
  if (value === undefined) return '';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Build the error for a failed response.
 * `value` is decoded as a failure detail when it is an object; otherwise
 * (some servers send a bare string) the raw value is the message.
 */
export function classifyError(httpStatus: number, envelope: Envelope): CommandError {
  const category = httpCategory(httpStatus);

  if (envelope.status === 0) {
    return new CommandError({ code: STATUS_NOT_SPECIFIED, category });
  }

  const value = envelope.value ?? {};
  const parsed = failureDetailSchema.safeParse(value);
  if (!parsed.success) {
    return new CommandError({
      code: envelope.status,
      category,
      detail: rawText(envelope.value),
    });
  }

  return new CommandError({
    code: envelope.status,
    category,
    detail: parsed.data.message,
    screen: parsed.data.screen ?? undefined,
    className: parsed.data.class,
    stackTrace: parsed.data.stackTrace,
  });
}
