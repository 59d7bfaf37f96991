import { createServer } from 'http';
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { Position, ServerMessage } from '@sitescope/shared';
import { APP_VERSION, createApp, locationMessage } from './app.js';
import type { AppConfig } from './config.js';
import type { AcquisitionError } from './errors.js';
import { LocationService } from './location/service.js';
import type { LocationServiceOptions } from './location/service.js';
import { combinePatches } from './location/settings.js';
import type { LocationSettingsPatch } from './location/settings.js';
import { loadCatalogFile } from './sites/catalog.js';

export interface RunningServer {
  server: Server;
  locationService: LocationService;
  close(): Promise<void>;
}

export interface StartOptions {
  /** Applied over the environment's location settings (CLI flags). */
  location?: LocationSettingsPatch;
  openers?: LocationServiceOptions['openers'];
}

/** Loads the catalog, starts tracking and serves REST on /api and fixes on /ws. */
export async function startServer(config: AppConfig, options: StartOptions = {}): Promise<RunningServer> {
  const catalog = await loadCatalogFile(config.catalogPath);

  const overrides = options.location ? combinePatches(config.location, options.location) : config.location;
  const locationService = new LocationService({
    settingsFile: config.settingsFile,
    overrides,
    debug: config.debug,
    openers: options.openers,
  });

  const app = createApp({ locationService, catalog, unit: config.unit, limit: config.limit, range: config.range });
  const server = createServer(app);
  const wss = new WebSocketServer({ server, path: '/ws' });

  function broadcast(message: ServerMessage) {
    const data = JSON.stringify(message);
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) client.send(data);
    });
  }

  locationService.on('location', (position: Position) => {
    broadcast(locationMessage(position, { catalog, unit: config.unit, limit: config.limit }));
  });
  locationService.on('acquisition_error', (err: AcquisitionError) => {
    broadcast({ type: 'acquisition_error', code: err.code, error: err.message });
  });

  wss.on('connection', (ws: WebSocket) => {
    console.log('⚡ Client connected');
    const last = locationService.getLastPosition();
    if (last) ws.send(JSON.stringify(locationMessage(last, { catalog, unit: config.unit, limit: config.limit })));
    ws.on('close', () => console.log('⚡ Client disconnected'));
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  locationService.start();

  const source = locationService.getSettings().source;
  console.log(`
  🗼 ╔═══════════════════════════════════════╗
  🗼 ║          S I T E S C O P E            ║
  🗼 ║     Nearest Site Finder v${APP_VERSION.padEnd(13)}║
  🗼 ╠═══════════════════════════════════════╣
  🗼 ║  HTTP:   http://${config.host}:${config.port}
  🗼 ║  WS:     ws://${config.host}:${config.port}/ws
  🗼 ║  Sites:  ${catalog.size}
  🗼 ║  GPS:    ${source}
  🗼 ╚═══════════════════════════════════════╝
  `);

  return {
    server,
    locationService,
    close: () => new Promise<void>((resolve, reject) => {
      locationService.stop();
      wss.clients.forEach(client => client.terminate());
      wss.close();
      server.close(err => (err ? reject(err) : resolve()));
    }),
  };
}
