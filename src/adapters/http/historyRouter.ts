import type { Router } from 'express';
import express from 'express';
import type { CaptureController } from '../../core/capture/CaptureController.js';
import type { ClipboardHistory } from '../../core/history/ClipboardHistory.js';
import type { InterpretationSession } from '../../core/session/InterpretationSession.js';
import { createLogger } from '../../utils/logger.js';
import { toEntryView, toOutcomeView, toSelectionView } from './views.js';

export interface HistoryRouterDeps {
  history: ClipboardHistory;
  controller: CaptureController;
  session: InterpretationSession;
  previewLength: number;
}

function parseIndex(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

export function createHistoryRouter(deps: HistoryRouterDeps): Router {
  const { history, controller, session, previewLength } = deps;
  const logger = createLogger({ component: 'historyRouter' });
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.status(200).json({
      maxSize: history.maxSize,
      selectedIndex: session.selectedIndex,
      entries: history.entries().map((entry, index) => toEntryView(entry, index, previewLength)),
    });
  });

  router.post('/capture', async (_req, res) => {
    try {
      const outcome = await controller.captureNow();
      res.status(200).json(toOutcomeView(outcome, previewLength));
    } catch (error) {
      logger.error({ error }, 'Capture request failed');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.delete('/', async (_req, res) => {
    try {
      await controller.clearHistory();
      session.handleCleared();
      res.status(204).end();
    } catch (error) {
      logger.error({ error }, 'Clear request failed');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.delete('/:index', async (req, res) => {
    const index = parseIndex(req.params.index);
    try {
      if (index === null || !(await controller.removeEntry(index))) {
        res.status(404).json({ error: 'No such history entry' });
        return;
      }
      session.handleRemoved(index);
      res.status(204).end();
    } catch (error) {
      logger.error({ error, index }, 'Remove request failed');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.post('/:index/select', (req, res) => {
    const index = parseIndex(req.params.index);
    if (index === null || !session.select(index)) {
      res.status(404).json({ error: 'No such history entry' });
      return;
    }
    const interpretation = session.interpretations();
    res.status(200).json(interpretation ? toSelectionView(interpretation, previewLength) : null);
  });

  return router;
}

export function createSelectionRouter(deps: Pick<HistoryRouterDeps, 'session' | 'previewLength'>): Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    const interpretation = deps.session.interpretations();
    if (!interpretation) {
      res.status(404).json({ error: 'Nothing selected' });
      return;
    }
    res.status(200).json(toSelectionView(interpretation, deps.previewLength));
  });

  router.delete('/', (_req, res) => {
    deps.session.clearSelection();
    res.status(204).end();
  });

  return router;
}
