import { once } from 'node:events';
import { createServer } from 'node:net';

/** Port 0 asks the OS for any free port */
const EPHEMERAL_PORT = 0;

export const isPortAvailable = async (port: number): Promise<boolean> => {
  if (port === EPHEMERAL_PORT) return true;
  const listener = createServer();
  try {
    listener.listen(port);
    await once(listener, 'listening');
    listener.close();
    await once(listener, 'close');
    return true;
  } catch {
    return false;
  }
};

/** First available port, checked in the order given */
export const findAvailablePort = async (ports: readonly number[]): Promise<number> => {
  for (const port of ports) {
    if (await isPortAvailable(port)) return port;
  }
  throw new Error(`No available ports found. Tried: ${ports.join(', ')}`);
};
