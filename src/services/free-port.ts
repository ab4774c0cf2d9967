import * as net from 'net';

/**
 * Ask the OS for an unused TCP port on `host`.
 *
 * The probe socket is closed before the port is returned; the caller binds
 * it straight away and owns it from then on.
 */
export async function findFreePort(host: string = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.unref();
    probe.on('error', reject);

    probe.listen(0, host, () => {
      const addr = probe.address();
      if (addr && typeof addr === 'object') {
        const { port } = addr;
        probe.close((err) => {
          if (err) reject(err);
          else resolve(port);
        });
      } else {
        probe.close();
        reject(new Error('Failed to get a free port'));
      }
    });
  });
}
