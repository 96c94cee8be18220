/**
 * Extract API
 *
 * POST /extract - Upload a PDF, receive Output.xlsx (or the table as JSON)
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContextAsync,
  runExtraction,
  extractPdfTextFromBuffer,
  writeWorkbookBuffer,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  errorMessage,
  ConfigError,
  PdfTextError,
  AuthError,
  XLSX_MIME_TYPE,
  type ModelTransport,
  type PipelineOptions,
  type ErrorEnvelope,
} from '@formtable/shared';

export interface AppDependencies {
  /** Called once per extraction request */
  createTransport: () => ModelTransport;
  extractText?: (pdf: Buffer) => Promise<string>;
}

type OutputFormat = 'xlsx' | 'json';

function correlationIdOf(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : ulid();
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function integerParam(name: string, value: unknown): number | undefined {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a positive integer`, [`/${name} must be integer`]);
  }
  return parseInt(raw, 10);
}

function parseFormat(value: unknown): OutputFormat {
  const raw = queryString(value) ?? 'xlsx';
  if (raw !== 'xlsx' && raw !== 'json') {
    throw new ConfigError('format must be "xlsx" or "json"', ['/format must be xlsx or json']);
  }
  return raw;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function toErrorResponse(error: unknown, correlationId: string): { status: number; body: ErrorEnvelope } {
  const envelope = (code: string, message: string): ErrorEnvelope => ({
    error: { code, message, correlation_id: correlationId },
  });

  if (error instanceof ConfigError) {
    return { status: 400, body: envelope('invalid_request', error.message) };
  }
  if (error instanceof PdfTextError) {
    return { status: 422, body: envelope('unprocessable_pdf', error.message) };
  }
  if (error instanceof AuthError) {
    return { status: 502, body: envelope('bad_gateway', error.message) };
  }
  if (statusOf(error) === 413) {
    return { status: 413, body: envelope('payload_too_large', `PDF exceeds ${config.maxUploadBytes} bytes`) };
  }
  return { status: 500, body: envelope('internal_error', errorMessage(error)) };
}

export function createApp(deps: AppDependencies): express.Express {
  const extractText = deps.extractText ?? extractPdfTextFromBuffer;
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);
    res.locals.correlationId = correlationId;
    next();
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        correlation_id: correlationIdOf(res),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'extract-api',
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Metrics collection failed', error);
      res.status(500).end();
    }
  });

  /**
   * POST /extract
   * Body: raw PDF bytes. Query: format=xlsx|json, tokenBudget, concurrency
   */
  app.post(
    '/extract',
    express.raw({ type: ['application/pdf', 'application/octet-stream'], limit: config.maxUploadBytes }),
    async (req: Request, res: Response) => {
      const correlationId = correlationIdOf(res);

      try {
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body) || body.length === 0) {
          throw new ConfigError('Request body must be a PDF sent as application/pdf');
        }

        const format = parseFormat(req.query.format);
        const overrides: Partial<PipelineOptions> = {
          tokenBudget: integerParam('tokenBudget', req.query.tokenBudget),
          concurrency: integerParam('concurrency', req.query.concurrency),
        };
        const documentId = ulid();

        const run = await runWithContextAsync({ correlationId, documentId }, async () => {
          const text = await extractText(body);
          return runExtraction({ id: documentId, text }, { transport: deps.createTransport(), options: overrides });
        });

        if (format === 'json') {
          res.json({ correlation_id: correlationId, rows: run.rows, summary: run.summary });
          return;
        }

        const workbook = await writeWorkbookBuffer(run.rows, run.summary);
        res.setHeader('Content-Type', XLSX_MIME_TYPE);
        res.setHeader('Content-Disposition', 'attachment; filename="Output.xlsx"');
        res.send(workbook);
      } catch (error) {
        const { status, body } = toErrorResponse(error, correlationId);
        if (status >= 500) {
          logger.error('Extraction request failed', error, { correlation_id: correlationId });
        } else {
          logger.warn('Extraction request rejected', { correlation_id: correlationId, error: errorMessage(error) });
        }
        res.status(status).json(body);
      }
    }
  );

  // Body parser failures (oversized upload, aborted stream)
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const { status, body } = toErrorResponse(error, correlationIdOf(res));
    res.status(status).json(body);
  });

  return app;
}
