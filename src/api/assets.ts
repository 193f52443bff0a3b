/**
 * Asset API routes.
 *
 * POST /assets: Store assets (ids computed when absent)
 * POST /assets/query: Fetch assets by id
 * GET /assets/:id: Fetch one asset
 */

import { Router } from 'express';
import { z } from 'zod';
import { assetFromWire, assetToWire } from '../domain/asset';
import { EngineError, notFoundError } from '../domain/errors';
import { LedgerStore } from '../storage/store';
import { sendError } from './middleware';

const PutAssetsBody = z.object({ assets: z.array(z.unknown()).min(1) });
const QueryAssetsBody = z.object({ ids: z.array(z.string()) });

export function createAssetRoutes(ledger: LedgerStore): Router {
  const router = Router();

  router.post('/assets', async (req, res) => {
    try {
      const body = PutAssetsBody.parse(req.body);
      const assets = body.assets.map(assetFromWire);
      const ids = await ledger.putMany(assets);
      res.status(201).json({ ids });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/assets/query', async (req, res) => {
    try {
      const body = QueryAssetsBody.parse(req.body);
      const assets = await ledger.getMany(body.ids);
      res.json({ assets: assets.map(assetToWire) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/assets/:id', async (req, res) => {
    try {
      const asset = await ledger.get(req.params.id);
      if (!asset) throw new EngineError(notFoundError('Asset', req.params.id));
      res.json({ asset: assetToWire(asset) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
