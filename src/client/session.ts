import { z } from 'zod';

import type { Transport } from '../protocol/transport.js';
import {
  cookieSchema,
  elementRefSchema,
  geoLocationSchema,
  logEntrySchema,
  orientationSchema,
} from '../schema/protocol.js';
import type {
  Capabilities,
  Cookie,
  FindStrategy,
  GeoLocation,
  HttpMethod,
  LogEntry,
  MouseButton,
  Orientation,
  TimeoutType,
} from '../schema/protocol.js';
import { decodeValue } from './decode.js';
import { WebElement } from './element.js';
import { WebStorage } from './storage.js';
import { WindowHandle } from './window.js';

export type FrameTarget = string | number | WebElement | null;

/**
 * One automation context on the remote browser.
 *
 * Every handle derived from a session shares the driver's transport;
 * nothing here serializes concurrent commands against the same session.
 */
export class Session {
  readonly id: string;
  /** As negotiated by the server, which may differ from what was asked. */
  readonly capabilities: Capabilities;
  readonly localStorage: WebStorage;
  readonly sessionStorage: WebStorage;
  private readonly transport: Transport;

  constructor(id: string, capabilities: Capabilities, transport: Transport) {
    this.id = id;
    this.capabilities = capabilities;
    this.transport = transport;
    this.localStorage = new WebStorage(this, 'local_storage');
    this.sessionStorage = new WebStorage(this, 'session_storage');
  }

  /**
   * Run a command under `/session/<id>`. `suffix` may hold further `%s`
   * placeholders filled from `params`. Returns the raw value.
   */
  async command(
    method: HttpMethod,
    suffix: string,
    params: readonly string[] = [],
    body?: unknown,
  ): Promise<unknown> {
    const { value } = await this.transport.execute(method, `/session/%s${suffix}`, {
      params: [this.id, ...params],
      body,
    });
    return value;
  }

  private async getString(suffix: string, command: string): Promise<string> {
    return decodeValue(z.string(), await this.command('GET', suffix), command);
  }

  // ── Lifecycle ───────────────────────────────────────────────

  async delete(): Promise<void> {
    await this.transport.execute('DELETE', '/session/%s', { params: [this.id] });
  }

  async setTimeouts(type: TimeoutType, ms: number): Promise<void> {
    await this.command('POST', '/timeouts', [], { type, ms });
  }

  async setAsyncScriptTimeout(ms: number): Promise<void> {
    await this.command('POST', '/timeouts/async_script', [], { ms });
  }

  async setImplicitWaitTimeout(ms: number): Promise<void> {
    await this.command('POST', '/timeouts/implicit_wait', [], { ms });
  }

  // ── Windows ─────────────────────────────────────────────────

  /** Handle addressing whichever window has focus, without a round trip. */
  currentWindow(): WindowHandle {
    return new WindowHandle(this, 'current');
  }

  async windowHandle(): Promise<WindowHandle> {
    return new WindowHandle(this, await this.getString('/window_handle', 'window handle'));
  }

  async windowHandles(): Promise<WindowHandle[]> {
    const raw = await this.command('GET', '/window_handles');
    return decodeValue(z.array(z.string()), raw, 'window handles').map(
      (id) => new WindowHandle(this, id),
    );
  }

  /** Focus a window by server handle or by its name attribute. */
  async focusWindow(name: string): Promise<void> {
    await this.command('POST', '/window', [], { name });
  }

  async closeCurrentWindow(): Promise<void> {
    await this.command('DELETE', '/window');
  }

  async focusFrame(target: FrameTarget): Promise<void> {
    await this.command('POST', '/frame', [], { id: target });
  }

  async focusParentFrame(): Promise<void> {
    await this.command('POST', '/frame/parent');
  }

  // ── Navigation ──────────────────────────────────────────────

  async getUrl(): Promise<string> {
    return this.getString('/url', 'url');
  }

  async navigate(url: string): Promise<void> {
    await this.command('POST', '/url', [], { url });
  }

  async forward(): Promise<void> {
    await this.command('POST', '/forward');
  }

  async back(): Promise<void> {
    await this.command('POST', '/back');
  }

  async refresh(): Promise<void> {
    await this.command('POST', '/refresh');
  }

  async title(): Promise<string> {
    return this.getString('/title', 'title');
  }

  async source(): Promise<string> {
    return this.getString('/source', 'source');
  }

  // ── Scripts and screenshots ─────────────────────────────────

  /** Runs a function body synchronously in the page; returns its result. */
  async executeScript(script: string, args: readonly unknown[] = []): Promise<unknown> {
    return this.command('POST', '/execute', [], { script, args });
  }

  /** Like `executeScript`, but the script signals completion via its last argument. */
  async executeAsyncScript(script: string, args: readonly unknown[] = []): Promise<unknown> {
    return this.command('POST', '/execute_async', [], { script, args });
  }

  /** PNG bytes of the current page. */
  async screenshot(): Promise<Buffer> {
    const encoded = await this.getString('/screenshot', 'screenshot');
    return Buffer.from(encoded, 'base64');
  }

  // ── Cookies ─────────────────────────────────────────────────

  async getCookies(): Promise<Cookie[]> {
    const raw = await this.command('GET', '/cookie');
    return decodeValue(z.array(cookieSchema), raw, 'cookies');
  }

  async setCookie(cookie: Cookie): Promise<void> {
    await this.command('POST', '/cookie', [], { cookie });
  }

  async deleteCookies(): Promise<void> {
    await this.command('DELETE', '/cookie');
  }

  async deleteCookie(name: string): Promise<void> {
    await this.command('DELETE', '/cookie/%s', [name]);
  }

  // ── Elements ────────────────────────────────────────────────

  /** Re-creates a reference from a known id, without a round trip. */
  element(id: string): WebElement {
    return new WebElement(this, id);
  }

  async findElement(using: FindStrategy, value: string): Promise<WebElement> {
    const raw = await this.command('POST', '/element', [], { using, value });
    return this.element(decodeValue(elementRefSchema, raw, 'find element').ELEMENT);
  }

  async findElements(using: FindStrategy, value: string): Promise<WebElement[]> {
    const raw = await this.command('POST', '/elements', [], { using, value });
    return decodeValue(z.array(elementRefSchema), raw, 'find elements').map((ref) =>
      this.element(ref.ELEMENT),
    );
  }

  async activeElement(): Promise<WebElement> {
    const raw = await this.command('POST', '/element/active');
    return this.element(decodeValue(elementRefSchema, raw, 'active element').ELEMENT);
  }

  /** Sends keystrokes to the focused element. */
  async sendKeys(sequence: string): Promise<void> {
    await this.command('POST', '/keys', [], { value: [...sequence] });
  }

  // ── Alerts ──────────────────────────────────────────────────

  async getAlertText(): Promise<string> {
    return this.getString('/alert_text', 'alert text');
  }

  async setAlertText(text: string): Promise<void> {
    await this.command('POST', '/alert_text', [], { text });
  }

  async acceptAlert(): Promise<void> {
    await this.command('POST', '/accept_alert');
  }

  async dismissAlert(): Promise<void> {
    await this.command('POST', '/dismiss_alert');
  }

  // ── Mouse ───────────────────────────────────────────────────

  /** Moves the mouse by an offset, relative to `element` when given. */
  async moveTo(element: WebElement | null, xoffset: number, yoffset: number): Promise<void> {
    await this.command('POST', '/moveto', [], {
      ...(element !== null ? { element: element.id } : {}),
      xoffset,
      yoffset,
    });
  }

  async click(button: MouseButton = 0): Promise<void> {
    await this.command('POST', '/click', [], { button });
  }

  async buttonDown(button: MouseButton = 0): Promise<void> {
    await this.command('POST', '/buttondown', [], { button });
  }

  async buttonUp(button: MouseButton = 0): Promise<void> {
    await this.command('POST', '/buttonup', [], { button });
  }

  async doubleClick(): Promise<void> {
    await this.command('POST', '/doubleclick');
  }

  // ── Touch ─────────────────────────────────────────────────

  /** Single tap on `element`. */
  async touchClick(element: WebElement): Promise<void> {
    await this.command('POST', '/touch/click', [], { element: element.id });
  }

  async touchDown(x: number, y: number): Promise<void> {
    await this.command('POST', '/touch/down', [], { x, y });
  }

  async touchUp(x: number, y: number): Promise<void> {
    await this.command('POST', '/touch/up', [], { x, y });
  }

  async touchMove(x: number, y: number): Promise<void> {
    await this.command('POST', '/touch/move', [], { x, y });
  }

  /** Finger scroll starting on `element`, or anywhere when it is null. */
  async touchScroll(element: WebElement | null, xoffset: number, yoffset: number): Promise<void> {
    await this.command('POST', '/touch/scroll', [], {
      ...(element !== null ? { element: element.id } : {}),
      xoffset,
      yoffset,
    });
  }

  async touchDoubleClick(element: WebElement): Promise<void> {
    await this.command('POST', '/touch/doubleclick', [], { element: element.id });
  }

  async touchLongClick(element: WebElement): Promise<void> {
    await this.command('POST', '/touch/longclick', [], { element: element.id });
  }

  /** Flick starting on `element`; `speed` in pixels per second. */
  async touchFlick(
    element: WebElement,
    xoffset: number,
    yoffset: number,
    speed: number,
  ): Promise<void> {
    await this.command('POST', '/touch/flick', [], {
      element: element.id,
      xoffset,
      yoffset,
      speed,
    });
  }

  /** Flick from wherever the finger is. */
  async touchFlickAnywhere(xspeed: number, yspeed: number): Promise<void> {
    await this.command('POST', '/touch/flick', [], { xspeed, yspeed });
  }

  // ── Input method ────────────────────────────────────────────

  async imeAvailableEngines(): Promise<string[]> {
    const raw = await this.command('GET', '/ime/available_engines');
    return decodeValue(z.array(z.string()), raw, 'ime engines');
  }

  async imeActiveEngine(): Promise<string> {
    return this.getString('/ime/active_engine', 'ime active engine');
  }

  /** Whether IME input is active right now, not merely available. */
  async isImeActivated(): Promise<boolean> {
    const raw = await this.command('GET', '/ime/activated');
    return decodeValue(z.boolean(), raw, 'ime activated');
  }

  async imeActivate(engine: string): Promise<void> {
    await this.command('POST', '/ime/activate', [], { engine });
  }

  async imeDeactivate(): Promise<void> {
    await this.command('POST', '/ime/deactivate');
  }

  // ── Device ──────────────────────────────────────────────────

  async getOrientation(): Promise<Orientation> {
    const raw = await this.command('GET', '/orientation');
    return decodeValue(orientationSchema, raw, 'orientation');
  }

  async setOrientation(orientation: Orientation): Promise<void> {
    await this.command('POST', '/orientation', [], { orientation });
  }

  async getGeoLocation(): Promise<GeoLocation> {
    const raw = await this.command('GET', '/location');
    return decodeValue(geoLocationSchema, raw, 'geo location');
  }

  async setGeoLocation(location: GeoLocation): Promise<void> {
    await this.command('POST', '/location', [], { location });
  }

  // ── Logs ────────────────────────────────────────────────────

  async log(type: string): Promise<LogEntry[]> {
    const raw = await this.command('POST', '/log', [], { type });
    return decodeValue(z.array(logEntrySchema), raw, 'log');
  }

  async logTypes(): Promise<string[]> {
    const raw = await this.command('GET', '/log/types');
    return decodeValue(z.array(z.string()), raw, 'log types');
  }
}
