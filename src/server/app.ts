// HTTP App - express routes over the DOCX controller

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { describeError } from '../errors';
import { getLogger } from '../logging/logger';
import type { DocxController, JsonResult } from './docx-controller';

const logger = getLogger('http');

const JSON_BODY_LIMIT = '5mb';

function send(res: Response, result: JsonResult): void {
  res.status(result.status).json(result.body);
}

export function createApp(controller: DocxController): express.Express {
  const app = express();

  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get('/health', (_req, res) => {
    send(res, controller.health());
  });

  app.post('/generate_docx', (req, res, next) => {
    controller
      .generateDocx(req.header('authorization'), req.body)
      .then((result) => send(res, result))
      .catch(next);
  });

  app.get('/download/:filename', (req, res, next) => {
    const { filename } = req.params;
    controller
      .resolveDownload(filename)
      .then(
        (filePath) => {
          res.download(filePath, filename, (error) => {
            if (error && !res.headersSent) {
              next(error);
            }
          });
        },
        (error: unknown) => send(res, controller.downloadError(error))
      )
      .catch(next);
  });

  app.get('/list_archives', (req, res, next) => {
    controller
      .listArchives(req.header('authorization'))
      .then((result) => send(res, result))
      .catch(next);
  });

  app.get('/stats', (req, res, next) => {
    controller
      .stats(req.header('authorization'))
      .then((result) => send(res, result))
      .catch(next);
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      send(res, { status: 400, body: { error: 'No JSON payload provided' } });
      return;
    }
    logger.error(`Unhandled request error: ${describeError(error)}`);
    send(res, { status: 500, body: { error: 'Internal server error' } });
  });

  return app;
}
