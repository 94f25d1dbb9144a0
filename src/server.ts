import type { Server } from 'node:http';
import { createApp } from './app.js';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { RecordProvider } from './provider.js';

export interface RunningServer {
  server: Server;
  /** The bound port (useful when configured with port 0) */
  port: number;
  close(): Promise<void>;
}

export interface StartServerOptions {
  config: Pick<AppConfig, 'port' | 'host' | 'basicAuth'>;
  provider: RecordProvider;
  logger: Logger;
}

export function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { config, provider, logger } = options;
  const app = createApp({ provider, logger, basicAuth: config.basicAuth });

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(config.port, config.host);

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      server.on('error', (err) => {
        logger.error({ err }, 'HTTP server error');
      });
      const address = server.address();
      const port =
        typeof address === 'object' && address !== null
          ? address.port
          : config.port;
      logger.info(
        { host: config.host, port, basicAuth: config.basicAuth !== undefined },
        'DynDNS proxy listening'
      );
      resolve({
        server,
        port,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((err) => (err ? rejectClose(err) : resolveClose()));
          }),
      });
    });
  });
}
