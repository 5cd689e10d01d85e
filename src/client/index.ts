/**
 * Client module.
 * Typed command surface over the transport: server, session, window,
 * element and storage handles. Each command maps to one URL template.
 */

export { WireClient } from './client.js';
export { Session } from './session.js';
export type { FrameTarget } from './session.js';
export { WindowHandle } from './window.js';
export { WebElement } from './element.js';
export { WebStorage } from './storage.js';
export type { StorageArea } from './storage.js';
export { decodeValue } from './decode.js';
