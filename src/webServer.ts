import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './env.js';
import { describeSpreadsheet, LabelGenerator } from './labelGenerator.js';
import { loadSpreadsheet, SpreadsheetLoadError } from './spreadsheetLoader.js';
import { isLayoutVariant, LAYOUT_VARIANTS } from './types.js';

function queryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function uploadedBody(req: Request): Buffer | null {
  return Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : null;
}

export function createWebApp(config: AppConfig, generator: LabelGenerator = new LabelGenerator(config.outputDir)): Express {
  const app = express();
  app.use(cors());

  const api = express.Router();
  app.use('/api', api);

  api.use((req: Request, res: Response, next: NextFunction) => {
    if (!config.webPassword) {
      next();
      return;
    }
    const header = req.headers.authorization || '';
    const token = header.startsWith('Bearer ') ? header.slice(7) : '';
    if (token !== config.webPassword) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  });

  api.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  const rawUpload = express.raw({ type: () => true, limit: config.uploadLimit });

  api.post('/labels/preview', rawUpload, async (req: Request, res: Response, next: NextFunction) => {
    const fileName = queryString(req.query.filename);
    const body = uploadedBody(req);
    if (!fileName || !body) {
      res.status(400).json({ error: 'Upload a file body and pass ?filename=' });
      return;
    }

    try {
      const table = await loadSpreadsheet(body, fileName);
      res.json(describeSpreadsheet(table));
    } catch (error) {
      next(error);
    }
  });

  api.post('/labels', rawUpload, async (req: Request, res: Response, next: NextFunction) => {
    const fileName = queryString(req.query.filename);
    const variant = queryString(req.query.variant) || config.defaultVariant;
    const body = uploadedBody(req);

    if (!isLayoutVariant(variant)) {
      res.status(400).json({ error: `Unknown variant "${variant}", expected ${LAYOUT_VARIANTS.join(' or ')}` });
      return;
    }
    if (!fileName || !body) {
      res.status(400).json({ error: 'Upload a file body and pass ?filename=' });
      return;
    }

    try {
      const generated = await generator.generateFromBuffer(body, fileName, variant);
      const { result } = generated;
      if (result.skipped.length > 0) {
        console.warn(`[webServer] ${fileName}: skipped ${result.skipped.length} location(s)`);
      }
      if (!generated.pdf) {
        res.status(422).json({
          error: 'No labels were generated. Check that the file has part number, description and location columns.',
          columns: result.columns,
          skipped: result.skipped
        });
        return;
      }

      console.log(`[webServer] ${fileName}: ${result.blockCount} label(s) on ${generated.pageCount} page(s)`);
      res
        .status(200)
        .set({
          'Content-Type': 'application/pdf',
          'Content-Disposition': `attachment; filename="${generated.fileName}"`,
          'X-Label-Count': String(result.blockCount),
          'X-Skipped-Locations': String(result.skipped.length)
        })
        .send(generated.pdf);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SpreadsheetLoadError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (error instanceof Error && 'type' in error && error.type === 'entity.too.large') {
      res.status(413).json({ error: `Upload exceeds ${config.uploadLimit}` });
      return;
    }
    console.error('[webServer] Label request failed:', error);
    res.status(500).json({ error: 'Label generation failed' });
  });

  return app;
}
