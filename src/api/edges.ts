/**
 * Edge API routes.
 *
 * POST /edges: Append edges to the ledger
 * GET /edges: Query edges by from, to or runId
 */

import { Router } from 'express';
import { z } from 'zod';
import { edgeFromWire, edgeToWire } from '../domain/edge';
import { EdgeQuery, LedgerStore } from '../storage/store';
import { sendError } from './middleware';

const AppendEdgesBody = z.object({ edges: z.array(z.unknown()).min(1) });

function queryParam(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function createEdgeRoutes(ledger: LedgerStore): Router {
  const router = Router();

  router.post('/edges', async (req, res) => {
    try {
      const body = AppendEdgesBody.parse(req.body);
      const count = await ledger.append(body.edges.map(edgeFromWire));
      res.status(201).json({ count });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/edges', async (req, res) => {
    try {
      const filter: EdgeQuery = {
        from: queryParam(req.query.from),
        to: queryParam(req.query.to),
        runId: queryParam(req.query.runId),
      };
      const edges = await ledger.query(filter);
      res.json({ edges: edges.map(edgeToWire) });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
