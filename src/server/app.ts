/**
 * Express API for assembling, rendering and validating queries and for the
 * template library.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { QueryConfigSchema, queryFromConfig } from '../persistence/config.js';
import { FileTemplateStore, type TemplateStore } from '../persistence/template-store.js';
import { sampleConfig } from '../persistence/sample.js';
import { buildReport } from '../report.js';
import { validateSQL } from '../validator/validate.js';
import { DefaultSqlTokenizer, type SqlTokenizer } from '../validator/tokenizer.js';
import { settings as defaultSettings, type Settings } from '../utils/settings.js';
import { apiLogger } from '../utils/logger.js';

// Request validation schemas
const RenderRequestSchema = z.object({ config: z.unknown() });
const ValidateRequestSchema = z.object({ sql: z.string().min(1).max(100000) });
const SaveTemplateSchema = z.object({ config: QueryConfigSchema });

export interface AppOptions {
  store?: TemplateStore;
  tokenizer?: SqlTokenizer;
  settings?: Settings;
}

export function createApp(options: AppOptions = {}): Express {
  const settings = options.settings ?? defaultSettings;
  const store = options.store ?? new FileTemplateStore(settings.templatesDir);
  const tokenizer = options.tokenizer ?? new DefaultSqlTokenizer();

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Rate limiting
  app.use('/api/', rateLimit({
    windowMs: settings.rateLimit.windowMs,
    max: settings.rateLimit.max,
    message: 'Too many requests from this IP, please try again later.'
  }));

  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // Render a configuration: SQL, validation, summaries and consistency problems
  app.post('/api/render', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { config } = RenderRequestSchema.parse(req.body);
      res.json(buildReport(queryFromConfig(config), tokenizer));
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/validate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sql } = ValidateRequestSchema.parse(req.body);
      res.json(validateSQL(sql, tokenizer));
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/example', (req: Request, res: Response) => {
    res.json({ config: QueryConfigSchema.parse(sampleConfig) });
  });

  app.get('/api/templates', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ templates: store.listAll() });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/templates/:name', (req: Request, res: Response, next: NextFunction) => {
    try {
      const config = store.get(req.params.name);
      if (!config) {
        return res.status(404).json({ error: 'Template not found' });
      }
      res.json({ name: req.params.name, config });
    } catch (error) {
      next(error);
    }
  });

  app.put('/api/templates/:name', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { config } = SaveTemplateSchema.parse(req.body);
      store.put(req.params.name, config);
      res.json({ name: req.params.name });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/api/templates/:name', (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!store.delete(req.params.name)) {
        return res.status(404).json({ error: 'Template not found' });
      }
      res.json({ deleted: req.params.name });
    } catch (error) {
      next(error);
    }
  });

  // Error handling middleware
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof z.ZodError) {
      return res.status(400).json({
        error: 'Validation error',
        details: error.errors
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    apiLogger.error('Request failed', { path: req.path, error: message });
    res.status(500).json({
      error: 'Internal server error',
      message: settings.env === 'development' ? message : 'Something went wrong'
    });
  });

  return app;
}

export function startServer(options: AppOptions = {}): Server {
  const settings = options.settings ?? defaultSettings;
  const app = createApp(options);
  return app.listen(settings.port, () => {
    apiLogger.info(`Query assembler API running on http://localhost:${settings.port}`);
  });
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer();
}
