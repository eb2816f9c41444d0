/**
 * Race-day entry point.
 *
 * Opens the transmitter serial link and starts the control server.
 * Configuration comes from the environment (see config.ts).
 *
 * Usage:
 *   npx tsx src/server/dev.ts
 *   SERIAL_PATH=/dev/ttyACM0 CONTROL_PORT=9000 npx tsx src/server/dev.ts
 */

import { loadConfig } from '../config.js';
import { createRaceContext } from '../race.js';
import { openSerialLink } from '../link/serial-link.js';
import { createTriggerNotifier } from '../link/trigger.js';
import { createControlServer } from './ws-server.js';
import { logEvent, logError } from '../utils/log.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const link = await openSerialLink({ path: config.serial.path, baudRate: config.serial.baudRate });
  const volumes = config.defaultVolume === undefined
    ? { perDevice: {} }
    : { defaultVolume: config.defaultVolume, perDevice: {} };

  const server = createControlServer({
    port: config.controlPort,
    link,
    notify: createTriggerNotifier(config.trigger),
    ackTimeoutMs: config.serial.ackTimeoutMs,
    context: createRaceContext({ timing: config.timing, volumes }),
  });

  logEvent('control.listening', { url: `ws://localhost:${config.controlPort}` });

  const shutdown = () => {
    logEvent('control.shutdown');
    server.close();
    link.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logError('link.close_failed', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logError('control.startup_failed', err);
  process.exit(1);
});
