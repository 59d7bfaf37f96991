import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { DistanceUnit, HealthResponse, LatLon, LocationMessage, Position, RankingResponse, SitesResponse } from '@sitescope/shared';
import { InvalidCoordinateError } from './errors.js';
import { toGrid } from './geo/grid.js';
import { assertLatLon } from './geo/math.js';
import type { LocationService } from './location/service.js';
import { nearest, withinRange } from './sites/ranker.js';
import type { SiteCatalog } from './sites/catalog.js';

export const APP_NAME = 'SiteScope';
export const APP_VERSION = '0.4.0';

export interface AppDeps {
  locationService: LocationService;
  catalog: SiteCatalog;
  unit: DistanceUnit;
  limit: number;
  range: number;
}

const unitSchema = z.enum(['km', 'mi', 'nm']);
const flag = z.enum(['true', 'false', '1', '0']).optional().transform(v => v === 'true' || v === '1');

const coordinate = z.string().trim().min(1).pipe(z.coerce.number());

const PointQuery = z.object({
  lat: coordinate.optional(),
  lon: coordinate.optional(),
}).refine(q => (q.lat === undefined) === (q.lon === undefined), {
  message: 'lat and lon must be given together',
  path: ['lat'],
});

const ManualPositionBody = z.object({
  latitude: z.number(),
  longitude: z.number(),
  altitude: z.number().optional(),
});

/** Payload pushed to WS clients for each fix. */
export function locationMessage(position: Position, deps: Pick<AppDeps, 'catalog' | 'unit' | 'limit'>): LocationMessage {
  return {
    type: 'location',
    position,
    grid: toGrid(position),
    nearest: nearest(position, deps.catalog, deps.unit, deps.limit),
  };
}

class NoPositionError extends Error {
  readonly code = 'NoPosition';

  constructor() {
    super('No position yet: pass lat and lon, or acquire one first');
  }
}

function sendError(res: Response, err: unknown) {
  if (err instanceof z.ZodError) {
    const error = err.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    res.status(400).json({ error, code: 'BadRequest' });
  } else if (err instanceof InvalidCoordinateError) {
    res.status(400).json({ error: err.message, code: err.code });
  } else if (err instanceof RangeError) {
    res.status(400).json({ error: err.message, code: 'BadRequest' });
  } else if (err instanceof NoPositionError) {
    res.status(404).json({ error: err.message, code: err.code });
  } else {
    res.status(500).json({ error: String(err) });
  }
}

export function createApp(deps: AppDeps) {
  const { locationService, catalog } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json());

  /** Query `lat`/`lon` when both are given, else the last fix. */
  const queryPosition = (req: Request): LatLon => {
    const { lat, lon } = PointQuery.parse(req.query);
    if (lat !== undefined && lon !== undefined) {
      const point = { latitude: lat, longitude: lon };
      assertLatLon(point);
      return point;
    }
    const last = locationService.getLastPosition();
    if (!last) throw new NoPositionError();
    return last;
  };

  app.get('/api/health', (_req, res) => {
    const body: HealthResponse = {
      name: APP_NAME,
      version: APP_VERSION,
      uptime: process.uptime(),
      status: 'operational',
      sites: catalog.size,
      source: locationService.getSettings().source,
    };
    res.json(body);
  });

  // --- Position ---
  app.get('/api/position', (_req, res) => {
    const position = locationService.getLastPosition();
    if (!position) return sendError(res, new NoPositionError());
    res.json(position);
  });

  app.post('/api/position', (req, res) => {
    try {
      const { latitude, longitude, altitude } = ManualPositionBody.parse(req.body);
      res.json(locationService.setManualPosition(latitude, longitude, altitude));
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/position/acquire', async (_req, res) => {
    try {
      const result = await locationService.acquireOnce();
      if (result.ok) res.json(result.position);
      else res.status(503).json({ error: result.error.message, code: result.error.code });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/grid', (req, res) => {
    try {
      res.json(toGrid(queryPosition(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // --- Sites ---
  app.get('/api/sites', (_req, res) => {
    const body: SitesResponse = { count: catalog.size, sites: [...catalog.sites], warnings: [...catalog.warnings] };
    res.json(body);
  });

  app.get('/api/sites/nearest', (req, res) => {
    try {
      const query = z.object({
        unit: unitSchema.default(deps.unit),
        limit: z.coerce.number().int().min(0).default(deps.limit),
        controlOnly: flag,
      }).parse(req.query);
      const position = queryPosition(req);
      const body = rankingResponse(position, query.unit,
        nearest(position, catalog, query.unit, query.limit, { controlOnly: query.controlOnly }));
      res.json(body);
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/sites/range', (req, res) => {
    try {
      const query = z.object({
        unit: unitSchema.default(deps.unit),
        range: z.coerce.number().nonnegative().default(deps.range),
      }).parse(req.query);
      const position = queryPosition(req);
      res.json(rankingResponse(position, query.unit, withinRange(position, catalog, query.unit, query.range)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // --- Settings ---
  app.get('/api/settings/location', (_req, res) => {
    res.json(locationService.getSettings());
  });

  app.post('/api/settings/location', (req, res) => {
    try {
      res.json(locationService.updateSettings(req.body));
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}

function rankingResponse(point: LatLon, unit: DistanceUnit, results: RankingResponse['results']): RankingResponse {
  return { position: { latitude: point.latitude, longitude: point.longitude }, unit, results };
}
