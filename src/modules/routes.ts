import express from 'express';
import { DispatcherService } from './dispatcher/dispatcher.service';
import { statusRoutes } from './status/status.routes';

export const buildRoutes = (dispatcher: DispatcherService) => {
  const router = express.Router();

  router.use('/status', statusRoutes(dispatcher));

  return router;
};
