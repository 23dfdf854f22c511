import express, { Express, NextFunction, Request, Response } from 'express';
import type { IncomingMessage } from 'http';
import { InterrogationService } from './services/InterrogationService.js';
import { AgentErrorCodes, badInput, errorMessage, httpStatusFor, isAgentError } from './errors.js';
import { createLogger, NAMESPACES } from './logging.js';
import tryJsonRepair from './utils/jsonRepair.js';

const log = createLogger(NAMESPACES.server.http);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError || (isRecord(error) && error.type === 'entity.parse.failed');
}

function optionalInt(value: unknown, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw badInput(`${name} must be a non-negative integer`, { [name]: value });
  }
  return parsed;
}

function sendError(res: Response, error: unknown): void {
  // Malformed generator output never leaves the pipeline; anything else unexpected is internal
  if (isAgentError(error) && error.code !== AgentErrorCodes.GENERATOR_OUTPUT_MALFORMED) {
    res.status(httpStatusFor(error)).json({ error: { code: error.code, message: error.message } });
    return;
  }
  res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error' } });
}

/**
 * HTTP surface over the interrogation service. Request bodies that are
 * almost JSON (single quotes, unquoted keys) are repaired before routing.
 */
export function createApp(service: InterrogationService): Express {
  const app = express();
  const rawBodies = new WeakMap<IncomingMessage, string>();

  app.use(express.json({
    limit: '1mb',
    verify: (req, _res, buf) => {
      rawBodies.set(req, buf.toString('utf-8'));
    }
  }));

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (!isBodyParseError(err)) return next(err);
    const raw = rawBodies.get(req) ?? '';
    const repaired = raw ? tryJsonRepair(raw) : null;
    if (repaired !== null) {
      try {
        req.body = JSON.parse(repaired);
        log('[HTTP] repaired malformed JSON body for %s %s', req.method, req.path);
        return next();
      } catch (parseError) {
        log('[HTTP] repaired body still unparsable: %s', errorMessage(parseError));
      }
    }
    res.status(400).json({ error: { code: AgentErrorCodes.BAD_INPUT, message: 'Invalid JSON body' } });
  });

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/stories', async (_req, res, next) => {
    try {
      res.json(await service.listStories());
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/stories/:storyId', async (req, res, next) => {
    try {
      res.json(await service.getStory(req.params.storyId));
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/stories', (req, res, next) => {
    try {
      const story = service.importStory(req.body);
      res.status(201).json({ id: story.id, title: story.title });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/agents', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body) || typeof body.storyId !== 'string' || typeof body.characterId !== 'string') {
        throw badInput('storyId and characterId are required');
      }
      const agentId = await service.spawn(body.storyId, body.characterId);
      res.status(201).json({ agentId });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/agents/:agentId/messages', async (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) throw badInput('Request body must be a JSON object');
      const { message, presentedEvidenceIds, locationId } = body;
      let text = '';
      if (typeof message === 'string') text = message;
      else if (message !== undefined) throw badInput('message must be a string');
      let evidenceIds: string[] | undefined;
      if (isStringArray(presentedEvidenceIds)) evidenceIds = presentedEvidenceIds;
      else if (presentedEvidenceIds !== undefined) throw badInput('presentedEvidenceIds must be an array of strings');
      let location: string | undefined;
      if (typeof locationId === 'string') location = locationId;
      else if (locationId !== undefined && locationId !== null) throw badInput('locationId must be a string');

      const result = await service.sendMessage(req.params.agentId, {
        text,
        presentedEvidenceIds: evidenceIds,
        locationId: location
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/agents/:agentId/history', async (req, res, next) => {
    try {
      const includeFull = req.query.includeFull === 'true' || req.query.includeFull === '1';
      const page = await service.getHistory(req.params.agentId, {
        limit: optionalInt(req.query.limit, 'limit'),
        offset: optionalInt(req.query.offset, 'offset'),
        includeFull
      });
      res.json(page);
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: AgentErrorCodes.NOT_FOUND, message: `No route for ${req.method} ${req.path}` } });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    log('[HTTP] %s %s failed: %s', req.method, req.path, errorMessage(err));
    sendError(res, err);
  });

  return app;
}
