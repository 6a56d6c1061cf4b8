import { Request, Response, NextFunction } from 'express';
import httpStatus from 'http-status';
import logger from '../../common/utils/logger';
import { DispatcherService } from '../dispatcher/dispatcher.service';

export const getStatus = (dispatcher: DispatcherService) => (req: Request, res: Response, next: NextFunction) => {
  try {
    res.status(httpStatus.OK).send(dispatcher.statusSnapshot());
  } catch (error) {
    logger.error({ err: error }, 'Error building status snapshot');
    next(error);
  }
};
