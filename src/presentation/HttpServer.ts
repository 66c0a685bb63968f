import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { TelescopeController } from './TelescopeController.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { ImagingParams, MosaicParams } from '../domain/entities/TelescopeState.js';
import { isJsonObject, type JsonObject } from '../domain/entities/TelescopeMessage.js';
import {
  InvalidInputError,
  isTelescopeError,
  type TelescopeErrorKind,
} from '../domain/errors/TelescopeErrors.js';

export interface HttpServerConfig {
  port: number;
  host?: string;
  /** Request bodies larger than this are refused */
  maxBodyBytes?: number;
}

export interface ApiRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  body: unknown;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

const STATUS_BY_KIND: Record<TelescopeErrorKind, number> = {
  InvalidInput: 400,
  SolarSafety: 403,
  NotFound: 404,
  NotConnected: 409,
  LocationNotConfigured: 409,
  BelowHorizon: 422,
  Unsupported: 501,
  ConnectionRefused: 502,
  ConnectionLost: 502,
  RemoteError: 502,
  DecodeError: 502,
  OperationFailed: 502,
  CatalogUnavailable: 503,
  HandshakeTimeout: 504,
  RequestTimeout: 504,
};

/**
 * Error body shared by every route: `{ success: false, error: { kind, message, context } }`
 */
export function toErrorResponse(error: unknown): ApiResponse {
  if (isTelescopeError(error)) {
    return { status: STATUS_BY_KIND[error.kind], body: { success: false, error: error.toJSON() } };
  }
  return {
    status: 500,
    body: {
      success: false,
      error: {
        kind: 'Internal',
        message: error instanceof Error ? error.message : 'Unknown error',
        context: {},
      },
    },
  };
}

function bodyObject(body: unknown): JsonObject {
  if (body === undefined || body === null) return {};
  if (!isJsonObject(body)) {
    throw new InvalidInputError('Request body must be a JSON object');
  }
  return body;
}

function optionalNumber(body: JsonObject, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new InvalidInputError(`${field} must be a number`, { field });
  }
  return value;
}

function requireNumber(body: JsonObject, field: string): number {
  const value = optionalNumber(body, field);
  if (value === undefined) {
    throw new InvalidInputError(`${field} is required`, { field });
  }
  return value;
}

function optionalString(body: JsonObject, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidInputError(`${field} must be a string`, { field });
  }
  return value;
}

function requireString(body: JsonObject, field: string): string {
  const value = optionalString(body, field);
  if (value === undefined || value.trim().length === 0) {
    throw new InvalidInputError(`${field} is required`, { field });
  }
  return value;
}

function optionalBoolean(body: JsonObject, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidInputError(`${field} must be true or false`, { field });
  }
  return value;
}

function optionalMosaic(body: JsonObject): MosaicParams | undefined {
  const value = body.mosaic;
  if (value === undefined || value === null) return undefined;
  if (!isJsonObject(value)) {
    throw new InvalidInputError('mosaic must be an object with width and height');
  }
  return { width: requireNumber(value, 'width'), height: requireNumber(value, 'height') };
}

function requireQuery(query: URLSearchParams, name: string): string {
  const value = query.get(name)?.trim();
  if (!value) {
    throw new InvalidInputError(`Query parameter ${name} is required`, { field: name });
  }
  return value;
}

function optionalDate(query: URLSearchParams, name: string): Date | undefined {
  const value = query.get(name);
  if (value === null) return undefined;
  const at = new Date(value);
  if (Number.isNaN(at.getTime())) {
    throw new InvalidInputError(`Query parameter ${name} must be an ISO 8601 date`, { field: name });
  }
  return at;
}

function imagingParams(body: JsonObject): Omit<ImagingParams, 'mosaic'> {
  return {
    exposureTime: requireNumber(body, 'exposureTime'),
    count: requireNumber(body, 'count'),
    gain: optionalNumber(body, 'gain'),
    binning: optionalNumber(body, 'binning'),
    filterName: optionalString(body, 'filterName'),
  };
}

/**
 * JSON action API over the telescope controller
 */
export class HttpServer {
  private server: Server | null = null;

  constructor(
    private readonly controller: TelescopeController,
    private readonly logger: ILogger,
    private readonly config: HttpServerConfig
  ) {}

  /** The underlying Node server once started, for upgrade handlers */
  get nodeServer(): Server | null {
    return this.server;
  }

  /**
   * Start the HTTP server
   */
  start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error('HTTP response failed', error);
        });
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject);
        this.logger.info('HTTP Server started', {
          port: this.config.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve(server);
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('HTTP Server stopped');
          resolve();
        });
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  /**
   * Route one parsed request. Never throws; failures become error bodies.
   */
  async route(request: ApiRequest): Promise<ApiResponse> {
    try {
      return await this.dispatch(request);
    } catch (error) {
      if (!isTelescopeError(error)) {
        this.logger.error('HTTP Request error', error, { method: request.method, path: request.path });
      }
      return toErrorResponse(error);
    }
  }

  private async dispatch({ method, path, query, body }: ApiRequest): Promise<ApiResponse> {
    const ok = (data: unknown): ApiResponse => ({ status: 200, body: data });
    const key = `${method} ${path}`;

    switch (key) {
      case 'GET /health':
        return this.health();
      case 'GET /api/status':
        return ok(await this.controller.getStatus());
      case 'GET /api/system':
        return ok(await this.controller.getSystemInfo());

      case 'POST /api/connect': {
        const input = bodyObject(body);
        return ok(
          await this.controller.connect({
            host: optionalString(input, 'host'),
            tcpPort: optionalNumber(input, 'tcpPort'),
            udpPort: optionalNumber(input, 'udpPort'),
            timeoutMs: optionalNumber(input, 'timeoutMs'),
          })
        );
      }
      case 'POST /api/disconnect':
        return ok(await this.controller.disconnect());

      case 'POST /api/reconnect/stop':
        return ok(this.controller.stopReconnecting());

      case 'POST /api/goto': {
        const input = bodyObject(body);
        return ok(
          await this.controller.gotoTarget(requireString(input, 'name'), {
            acknowledgeSolarRisk: optionalBoolean(input, 'acknowledgeSolarRisk'),
            skipVisibilityCheck: optionalBoolean(input, 'skipVisibilityCheck'),
            mosaic: optionalMosaic(input),
          })
        );
      }
      case 'POST /api/goto/coordinates': {
        const input = bodyObject(body);
        return ok(
          await this.controller.gotoCoordinates({
            rightAscensionHours: requireNumber(input, 'rightAscensionHours'),
            declinationDegrees: requireNumber(input, 'declinationDegrees'),
            targetName: optionalString(input, 'targetName'),
            skipVisibilityCheck: optionalBoolean(input, 'skipVisibilityCheck'),
            mosaic: optionalMosaic(input),
          })
        );
      }

      case 'GET /api/targets/search':
        return ok(await this.controller.searchTarget(requireQuery(query, 'name')));
      case 'GET /api/targets/visibility':
        return ok(
          await this.controller.checkTargetVisibility(requireQuery(query, 'name'), optionalDate(query, 'at'))
        );
      case 'DELETE /api/targets/cache':
        this.controller.clearTargetCache();
        return ok({ success: true, message: 'Target cache cleared' });
      case 'GET /api/solar-safety':
        return ok(await this.controller.checkSolarSafety());

      case 'POST /api/imaging/start': {
        const input = bodyObject(body);
        return ok(await this.controller.startImaging({ ...imagingParams(input), mosaic: optionalMosaic(input) }));
      }
      case 'POST /api/imaging/mosaic': {
        const input = bodyObject(body);
        const mosaic = optionalMosaic(input);
        if (!mosaic) {
          throw new InvalidInputError('mosaic is required', { field: 'mosaic' });
        }
        return ok(
          await this.controller.startMosaicImaging({
            ...imagingParams(input),
            targetName: requireString(input, 'targetName'),
            skipVisibilityCheck: optionalBoolean(input, 'skipVisibilityCheck'),
            mosaic,
          })
        );
      }
      case 'POST /api/imaging/stop':
        return ok(await this.controller.stopImaging());
      case 'GET /api/imaging/status':
        return ok(this.controller.getImagingStatus());

      case 'POST /api/mount/park':
        return ok(await this.controller.park(optionalBoolean(bodyObject(body), 'equatorialMode') ?? false));
      case 'POST /api/mount/unpark':
        return ok(await this.controller.unpark());
      case 'POST /api/mount/stop':
        return ok(await this.controller.emergencyStop());
      case 'POST /api/focus/auto':
        return ok(await this.controller.startAutoFocus());
      case 'POST /api/calibration':
        return ok(await this.controller.startCalibration());

      case 'GET /api/location': {
        const location = this.controller.getLocation();
        return ok({ configured: location !== null, location });
      }
      case 'PUT /api/location': {
        const input = bodyObject(body);
        const location = this.controller.setLocation({
          latitude: requireNumber(input, 'latitude'),
          longitude: requireNumber(input, 'longitude'),
          elevationMeters: optionalNumber(input, 'elevationMeters') ?? 0,
          timezoneId: optionalString(input, 'timezoneId') ?? 'UTC',
        });
        return ok({ configured: true, location });
      }

      default:
        return { status: 404, body: { error: 'Not Found', path } };
    }
  }

  private async health(): Promise<ApiResponse> {
    const status = await this.controller.getSystemInfo();
    const healthy = status.connectionState === 'connected' || status.connectionState === 'degraded';
    return {
      status: healthy ? 200 : 503,
      body: {
        status: healthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        connection: status.connectionState,
        uptime: status.uptimeSeconds,
      },
    };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path: url.pathname });

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    let response: ApiResponse;
    try {
      const body = method === 'GET' ? undefined : await this.parseBody(req);
      response = await this.route({ method, path: url.pathname, query: url.searchParams, body });
    } catch (error) {
      response = toErrorResponse(error);
    }
    this.sendJson(res, response.status, response.body);
  }

  private parseBody(req: IncomingMessage): Promise<unknown> {
    const limit = this.config.maxBodyBytes ?? 64 * 1024;
    return new Promise((resolve, reject) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
        if (body.length > limit) {
          reject(new InvalidInputError(`Request body exceeds ${limit} bytes`));
          req.destroy();
        }
      });
      req.on('end', () => {
        try {
          resolve(body ? JSON.parse(body) : undefined);
        } catch {
          reject(new InvalidInputError('Invalid JSON body'));
        }
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }
}
