import express from 'express';
import type {Request, Response} from 'express';
import {ChargerController, CommandSession} from './charger-controller';
import type {ConnectionRegistry} from '../ocpp/connection-registry';

export function createChargerRouter(registry: ConnectionRegistry<CommandSession>) {
  const router = express.Router();
  const chargerController = new ChargerController(registry);

  // Connection endpoints:
  router.get('/chargers/online', (req: Request, res: Response) => {
    chargerController.listOnline(req, res);
  });

  router.get('/chargers/:identity/connection', (req: Request, res: Response) => {
    chargerController.getConnection(req, res);
  });

  router.delete('/chargers/:identity/connection', async (req: Request, res: Response) => {
    await chargerController.closeConnection(req, res);
  });

  // Outbound OCPP commands:
  router.post('/chargers/:identity/commands/:action', async (req: Request, res: Response) => {
    await chargerController.sendCommand(req, res);
  });

  return router;
}
