import express from 'express';
import cors from 'cors';

import { loadConfig, type AppConfig } from './config/env';
import { registerFontsFromDir } from './lib/registerFonts';
import { LayerRenderer } from './modules/watermark/layerRenderer';
import { createWatermarkRouter } from './modules/watermark/watermark.routes';

export function createServer(opts: { config?: AppConfig; renderer?: LayerRenderer } = {}) {
  const config = opts.config ?? loadConfig();
  const renderer = opts.renderer ?? new LayerRenderer();

  if (config.fontsDir) {
    registerFontsFromDir(renderer, config.fontsDir);
  }

  const app = express();

  const allowlist = new Set(config.corsOrigins);

  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true); // curl/postman
        cb(null, allowlist.has(origin));
      },
      exposedHeaders: ["X-Canvas-Width", "X-Canvas-Height", "X-Offset-Ratio"],
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get('/health', (req, res) => {
    res.json({ ok: true, service: 'photomark-api' });
  });

  app.use('/watermark', createWatermarkRouter({ renderer, previewCap: config.previewCap }));

  return app;
}
