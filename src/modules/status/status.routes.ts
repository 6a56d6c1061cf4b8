import express from 'express';
import { DispatcherService } from '../dispatcher/dispatcher.service';
import { getStatus } from './status.controller';

export const statusRoutes = (dispatcher: DispatcherService) => {
  const router = express.Router();

  router.get('/', getStatus(dispatcher));

  return router;
};
