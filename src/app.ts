import express from 'express';
import cors from 'cors';
import { config } from './config';
import { createDefaultPrinterDeps, type PrinterDeps } from './services/printer.service';
import { createPrintRouter } from './routes/print.routes';

export function createApp(deps: PrinterDeps = createDefaultPrinterDeps()): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: config.corsOrigins.length > 0 ? config.corsOrigins : false }));
  app.use(express.json({ limit: '10mb' }));

  // API Routes
  app.use('/api/print', createPrintRouter(deps));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      success: true,
      service: 'print-dispatch',
      version: config.version,
      variant: config.defaultVariant,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
