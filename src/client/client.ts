import { z } from 'zod';

import { ProtocolError } from '../errors/index.js';
import type { Transport } from '../protocol/transport.js';
import { capabilitiesSchema, serverStatusSchema, sessionInfoSchema } from '../schema/protocol.js';
import type { Capabilities, ServerStatus } from '../schema/protocol.js';
import { decodeValue } from './decode.js';
import { Session } from './session.js';

/** Server-level commands: status and session management. */
export class WireClient {
  readonly transport: Transport;

  constructor(transport: Transport) {
    this.transport = transport;
  }

  async status(): Promise<ServerStatus> {
    const { value } = await this.transport.execute('GET', '/status');
    return decodeValue(serverStatusSchema, value ?? {}, 'status');
  }

  /**
   * Ask the server for a session as close as possible to `desired`;
   * `required` capabilities must be honored. The server answers the POST
   * with a redirect to the new session, which the transport follows.
   */
  async newSession(
    desired: Capabilities = {},
    required: Capabilities = {},
  ): Promise<Session> {
    const { sessionId, value } = await this.transport.execute('POST', '/session', {
      body: { desiredCapabilities: desired, requiredCapabilities: required },
    });
    if (sessionId === '') {
      throw new ProtocolError('server did not return a session id');
    }
    const capabilities = decodeValue(capabilitiesSchema, value ?? {}, 'new session');
    return new Session(sessionId, capabilities, this.transport);
  }

  /** Sessions currently active on the server. */
  async sessions(): Promise<Session[]> {
    const { value } = await this.transport.execute('GET', '/sessions');
    return decodeValue(z.array(sessionInfoSchema), value ?? [], 'sessions').map(
      (info) => new Session(info.id, info.capabilities ?? {}, this.transport),
    );
  }
}
