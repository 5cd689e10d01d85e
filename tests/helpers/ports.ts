import { closeServer, tryListen } from '../../src/driver/ports.js';

/** A port the OS just handed out and released. */
export async function ephemeralPort(): Promise<number> {
  const server = await tryListen(0);
  if (server === null) throw new Error('could not bind an ephemeral port');
  const address = server.address();
  await closeServer(server);
  if (address === null || typeof address === 'string') {
    throw new Error('listener has no TCP address');
  }
  return address.port;
}

/** A base port whose lock port (base - 1) and base itself are both free. */
export async function freeBasePort(): Promise<number> {
  for (let attempt = 0; attempt < 20; attempt++) {
    const base = await ephemeralPort();
    const lock = await tryListen(base - 1);
    if (lock === null) continue;
    await closeServer(lock);
    const probe = await tryListen(base);
    if (probe === null) continue;
    await closeServer(probe);
    return base;
  }
  throw new Error('no free base port pair found');
}
