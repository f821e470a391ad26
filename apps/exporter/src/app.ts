import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createRouter, RouterDependencies } from './routes/index.js';

export const createApp = (deps: RouterDependencies) => {
  const app = express();

  app.use(helmet());
  app.use(morgan('dev'));

  app.use(createRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ message: 'Route not found' });
  });

  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error(error);
    res.status(500).json({ message: error.message || 'Unexpected server error' });
  });

  return app;
};
