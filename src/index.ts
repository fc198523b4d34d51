import express from 'express';
import {Socket} from 'node:net';
import type {NextFunction, Request, Response} from 'express';
import pinoHttp from 'pino-http';
import {createSQLiteRepositories, openDatabase} from './db';
import {createChargerRouter} from './controller/charger-router';
import {createSessionRouter} from './controller/session-router';
import {CentralSystem} from './ocpp/central-system';
import {AuthorizationService} from './service/authorization-service';
import {ChargeSessionTracker} from './service/charge-session-tracker';
import {PaymentStatusSynchronizer} from './service/payment-status-synchronizer';
import {SessionBilling} from './service/session-billing';
import {TariffEngine} from './service/tariff-engine';
import config from './config';
import logger from './logger';

(async () => {
  const db = await openDatabase(config.databaseFile);
  const repositories = createSQLiteRepositories(db);

  const tracker = new ChargeSessionTracker(repositories.sessions, repositories.events);
  const synchronizer = new PaymentStatusSynchronizer(repositories.sessions, repositories.payments);
  const billing = new SessionBilling(repositories.sessions, new TariffEngine(repositories.tariffs), synchronizer);

  const centralSystem = new CentralSystem(
    {
      chargers: repositories.chargers,
      connectors: repositories.connectors,
      events: repositories.events,
      rfidCards: repositories.rfidCards,
      payments: repositories.payments,
      authorization: new AuthorizationService(repositories.rfidCards),
      tracker,
      billing,
      synchronizer,
      heartbeatIntervalSec: config.heartbeatIntervalSec,
    },
    {
      heartbeatIntervalSec: config.heartbeatIntervalSec,
      heartbeatTimeoutMultiplier: config.heartbeatTimeoutMultiplier,
      callTimeoutMs: config.callTimeoutMs,
    }
  );

  const app = express();
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === '/health',
      },
    })
  );
  app.use(express.json());
  app.get('/health', (_req: Request, res: Response) => {
    res.json({status: 'ok', connectedChargers: centralSystem.registry.listIdentities().length});
  });
  app.use(createChargerRouter(centralSystem.registry));
  app.use(createSessionRouter(synchronizer, tracker));
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(err, `Unhandled error on ${req.method} ${req.url}`);
    res.status(500).json({error: 'Internal server error'});
  });

  const httpServer = app.listen(config.port, '0.0.0.0', () => {
    logger.info(`HTTP server listening on http://${config.host}:${config.port}`);
  });

  httpServer.on('upgrade', (req, socket, head) => {
    logger.info(`HTTP upgrade request received from ${req.socket.remoteAddress}`);
    if (!(socket instanceof Socket)) {
      logger.warn('Upgrade request on a non-TCP stream, dropping it');
      socket.destroy();
      return;
    }
    centralSystem.handleUpgrade(req, socket, head);
  });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    httpServer.close();
    await centralSystem.close();
    await db.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error(err, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
})().catch((err: unknown) => {
  logger.fatal(err, 'Failed to start central system');
  process.exit(1);
});
