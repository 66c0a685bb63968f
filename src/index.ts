#!/usr/bin/env node
import {
  loadConfig,
  observerLocationFrom,
  validateConfig,
} from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { NodeSessionTransport } from "./infrastructure/protocol/NodeSessionTransport.js";
import { ProtocolSession } from "./infrastructure/protocol/ProtocolSession.js";
import { LocalEphemerisCatalog } from "./infrastructure/catalogs/LocalEphemerisCatalog.js";
import { DeepSkyCatalog } from "./infrastructure/catalogs/DeepSkyCatalog.js";
import { createRemoteCatalogs } from "./infrastructure/catalogs/remoteCatalogs.js";
import { SessionManager } from "./application/SessionManager.js";
import { TargetResolver } from "./application/TargetResolver.js";
import { LocationManager } from "./application/LocationManager.js";
import { TelescopeController } from "./presentation/TelescopeController.js";
import { HttpServer } from "./presentation/HttpServer.js";
import { EventStreamServer } from "./presentation/EventStreamServer.js";
import { errorMessage } from "./domain/errors/TelescopeErrors.js";

// Bridge version
const BRIDGE_VERSION = "1.0.0";

/**
 * Main entry point for the telescope bridge
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info("Telescope bridge starting", {
    version: BRIDGE_VERSION,
    telescopeHost: config.telescope.host ?? "(not configured)",
  });

  const locationManager = new LocationManager(logger.child({ component: "LocationManager" }));
  const observer = observerLocationFrom(config);
  if (observer) {
    locationManager.configure(observer);
  } else {
    logger.warn("Observer location not configured; visibility checks are skipped until it is set");
  }

  const deepSky = DeepSkyCatalog.fromFile(config.catalogs.deepSkyCatalogPath);
  const resolver = new TargetResolver(
    new LocalEphemerisCatalog(() => locationManager.getLocation()),
    [deepSky, ...createRemoteCatalogs()],
    logger.child({ component: "TargetResolver" }),
    {
      cacheTtlMs: config.catalogs.cacheTtlMs,
      cacheCapacity: config.catalogs.cacheSize,
      catalogTimeoutMs: config.catalogs.timeoutMs,
    }
  );
  logger.info("Target catalogs ready", {
    catalogs: resolver.catalogNames,
    deepSkyObjects: deepSky.size,
  });

  const transport = new NodeSessionTransport(logger.child({ component: "SessionTransport" }));
  const session = new SessionManager(
    () =>
      new ProtocolSession(
        {
          host: config.telescope.host,
          tcpPort: config.telescope.tcpPort,
          udpPort: config.telescope.udpPort,
          connectTimeoutMs: config.telescope.connectTimeoutMs,
          requestTimeoutMs: config.telescope.requestTimeoutMs,
          longRunningTimeoutMs: config.telescope.gotoTimeoutMs,
          heartbeatIntervalMs: config.heartbeat.intervalMs,
          silenceThresholdMs: config.heartbeat.silenceMs,
          reconnectBaseDelayMs: config.reconnection.baseDelayMs,
          reconnectMaxDelayMs: config.reconnection.maxDelayMs,
          reconnectMaxAttempts: config.reconnection.maxAttempts,
        },
        transport,
        logger.child({ component: "ProtocolSession" })
      ),
    logger
  );

  const controller = new TelescopeController(
    session,
    resolver,
    locationManager,
    logger.child({ component: "TelescopeController" }),
    { version: BRIDGE_VERSION, gotoTimeoutMs: config.telescope.gotoTimeoutMs }
  );

  session.onConnectionStateChange((state, previous) => {
    logger.info("Telescope connection state changed", { state, previous });
  });
  // After an automatic reconnection the pointing state may have moved on
  session.onReconnected(async () => {
    await controller.resyncAfterReconnect();
  });

  const httpServer = new HttpServer(controller, logger.child({ component: "HttpServer" }), {
    port: config.http.port,
    host: config.http.host,
  });
  const eventStream = new EventStreamServer(session, logger.child({ component: "EventStreamServer" }));

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    await eventStream.stop();
    await httpServer.stop();
    await controller.stop();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.fatal("Shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    controller.start();
    const server = await httpServer.start();
    eventStream.attach(server);

    if (config.telescope.host) {
      try {
        const result = await controller.connect();
        logger.info(result.message);
      } catch (error) {
        // The bridge stays up; POST /api/connect retries on request
        logger.error("Initial telescope connection failed", error, {
          host: config.telescope.host,
        });
      }
    } else {
      logger.info("TELESCOPE_HOST not set; waiting for POST /api/connect");
    }

    logger.info(`Bridge is running. API available at http://localhost:${config.http.port}`);
    logger.info("Press Ctrl+C to stop.");
  } catch (error) {
    logger.fatal("Failed to start bridge", error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("Unhandled error:", errorMessage(error));
  process.exit(1);
});
