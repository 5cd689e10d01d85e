import { z } from 'zod';

import { elementRefSchema, positionSchema, sizeSchema } from '../schema/protocol.js';
import type { ElementRef, FindStrategy, Position, Size } from '../schema/protocol.js';
import { decodeValue } from './decode.js';
import type { Session } from './session.js';

/**
 * A server-side DOM element reference. The id is opaque; whether two
 * references point at the same node is for the server to say (`equals`).
 */
export class WebElement {
  readonly session: Session;
  readonly id: string;

  constructor(session: Session, id: string) {
    this.session = session;
    this.id = id;
  }

  /** Wire form used in command bodies (`{ ELEMENT: id }`). */
  toJSON(): ElementRef {
    return { ELEMENT: this.id };
  }

  private async get(suffix: string, params: readonly string[] = []): Promise<unknown> {
    return this.session.command('GET', `/element/%s${suffix}`, [this.id, ...params]);
  }

  private async post(suffix: string, body?: unknown): Promise<void> {
    await this.session.command('POST', `/element/%s${suffix}`, [this.id], body);
  }

  // ── Search ──────────────────────────────────────────────────

  /** First descendant matching the strategy. */
  async findElement(using: FindStrategy, value: string): Promise<WebElement> {
    const raw = await this.session.command('POST', '/element/%s/element', [this.id], {
      using,
      value,
    });
    const ref = decodeValue(elementRefSchema, raw, 'find element');
    return new WebElement(this.session, ref.ELEMENT);
  }

  async findElements(using: FindStrategy, value: string): Promise<WebElement[]> {
    const raw = await this.session.command('POST', '/element/%s/elements', [this.id], {
      using,
      value,
    });
    return decodeValue(z.array(elementRefSchema), raw, 'find elements').map(
      (ref) => new WebElement(this.session, ref.ELEMENT),
    );
  }

  // ── Interaction ─────────────────────────────────────────────

  async click(): Promise<void> {
    await this.post('/click');
  }

  async submit(): Promise<void> {
    await this.post('/submit');
  }

  async clear(): Promise<void> {
    await this.post('/clear');
  }

  /** Types `sequence` into the element, one key per character. */
  async sendKeys(sequence: string): Promise<void> {
    await this.post('/value', { value: [...sequence] });
  }

  // ── State ───────────────────────────────────────────────────

  async text(): Promise<string> {
    return decodeValue(z.string(), await this.get('/text'), 'element text');
  }

  async tagName(): Promise<string> {
    return decodeValue(z.string(), await this.get('/name'), 'element name');
  }

  async isSelected(): Promise<boolean> {
    return decodeValue(z.boolean(), await this.get('/selected'), 'element selected');
  }

  async isEnabled(): Promise<boolean> {
    return decodeValue(z.boolean(), await this.get('/enabled'), 'element enabled');
  }

  async isDisplayed(): Promise<boolean> {
    return decodeValue(z.boolean(), await this.get('/displayed'), 'element displayed');
  }

  /** Attribute value, or null when the element has no such attribute. */
  async getAttribute(name: string): Promise<string | null> {
    return decodeValue(
      z.string().nullable(),
      await this.get('/attribute/%s', [name]),
      'element attribute',
    );
  }

  async cssProperty(name: string): Promise<string> {
    return decodeValue(z.string(), await this.get('/css/%s', [name]), 'element css');
  }

  /** Asks the server whether both references denote the same node. */
  async equals(other: WebElement): Promise<boolean> {
    return decodeValue(z.boolean(), await this.get('/equal/%s', [other.id]), 'element equal');
  }

  // ── Geometry ────────────────────────────────────────────────

  async location(): Promise<Position> {
    return decodeValue(positionSchema, await this.get('/location'), 'element location');
  }

  /** Scrolls the element into view, then reports its location. */
  async locationInView(): Promise<Position> {
    return decodeValue(
      positionSchema,
      await this.get('/location_in_view'),
      'element location in view',
    );
  }

  async size(): Promise<Size> {
    return decodeValue(sizeSchema, await this.get('/size'), 'element size');
  }
}
