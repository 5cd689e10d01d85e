import { positionSchema, sizeSchema } from '../schema/protocol.js';
import type { Position, Size } from '../schema/protocol.js';
import { decodeValue } from './decode.js';
import type { Session } from './session.js';

/** Server-assigned window handle; `'current'` addresses the focused window. */
export class WindowHandle {
  readonly session: Session;
  readonly id: string;

  constructor(session: Session, id: string) {
    this.session = session;
    this.id = id;
  }

  async getSize(): Promise<Size> {
    const raw = await this.session.command('GET', '/window/%s/size', [this.id]);
    return decodeValue(sizeSchema, raw, 'window size');
  }

  async setSize(size: Size): Promise<void> {
    await this.session.command('POST', '/window/%s/size', [this.id], {
      width: size.width,
      height: size.height,
    });
  }

  async getPosition(): Promise<Position> {
    const raw = await this.session.command('GET', '/window/%s/position', [this.id]);
    return decodeValue(positionSchema, raw, 'window position');
  }

  async setPosition(position: Position): Promise<void> {
    await this.session.command('POST', '/window/%s/position', [this.id], {
      x: position.x,
      y: position.y,
    });
  }

  async maximize(): Promise<void> {
    await this.session.command('POST', '/window/%s/maximize', [this.id]);
  }
}
