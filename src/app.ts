/**
 * HTTP API for the Inglish translator
 *
 * createApp() builds the Express app without listening, so tests can drive
 * it in process.
 */

import express, { type Express, type Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import { validateConfig, hasAIProvider } from './config.js';
import { EngineService, type PipelineSelection } from './services/engine-integration.js';
import {
  GlossaryNotFoundError,
  TransliterationUnavailableError,
  isTargetLanguage,
  isTranslatorType,
  type ScriptFormat,
} from './engine/index.js';
import { isRecord } from './engine/utils/guards.js';

export const API_VERSION = '0.1.0';

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

export function createApp(config: AppConfig, engine: EngineService = new EngineService(config)): Express {
  const app = express();
  const configValidation = validateConfig(config);

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // ============ API Routes ============

  // System status
  app.get('/api/status', (_req, res) => {
    res.json({
      version: API_VERSION,
      ready: true,
      ai: {
        provider: hasAIProvider(config) ? 'OpenAI' : null,
        model: config.openai.model,
        configured: hasAIProvider(config),
      },
      translation: {
        defaultDomain: config.translation.defaultDomain,
        defaultTargetLanguage: config.translation.defaultTargetLanguage,
        defaultTranslator: config.translation.defaultTranslator,
      },
      config: {
        valid: configValidation.valid,
        errors: configValidation.errors,
      },
    });
  });

  // Available glossary domains
  app.get('/api/domains', (_req, res) => {
    try {
      res.json({ domains: engine.listDomains(), default: config.translation.defaultDomain });
    } catch (error) {
      sendError(res, error, 'list domains');
    }
  });

  // Translate one text
  app.post('/api/translate', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.text !== 'string') {
      return res.status(400).json({ error: '"text" must be a string' });
    }

    const selection = parseSelection(body);
    if (!selection.ok) {
      return res.status(400).json({ error: selection.error });
    }

    try {
      const result = await engine.getPipeline(selection.value).translate(body.text);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'translate');
    }
  });

  // Translate several texts, order preserved
  app.post('/api/translate/batch', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !isStringArray(body.texts)) {
      return res.status(400).json({ error: '"texts" must be an array of strings' });
    }

    const selection = parseSelection(body);
    if (!selection.ok) {
      return res.status(400).json({ error: selection.error });
    }

    try {
      const results = await engine.getPipeline(selection.value).translateBatch(body.texts);
      res.json({ results });
    } catch (error) {
      sendError(res, error, 'translate batch');
    }
  });

  // Extract and guard terms only
  app.post('/api/extract', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.text !== 'string') {
      return res.status(400).json({ error: '"text" must be a string' });
    }

    const selection = parseSelection(body);
    if (!selection.ok) {
      return res.status(400).json({ error: selection.error });
    }

    try {
      const { extractor } = engine.getPipeline(selection.value);
      const terms = extractor.extractTerms(body.text);
      res.json({
        domain: extractor.domain,
        terms,
        guarded: extractor.guardTerms(body.text, terms),
      });
    } catch (error) {
      sendError(res, error, 'extract terms');
    }
  });

  // Convert between Roman and Devanagari
  app.post('/api/convert', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.text !== 'string') {
      return res.status(400).json({ error: '"text" must be a string' });
    }

    const to = parseScriptFormat(body.to);
    if (!to) {
      return res.status(400).json({ error: '"to" must be "roman" or "devanagari"' });
    }

    const selection = parseSelection(body);
    if (!selection.ok) {
      return res.status(400).json({ error: selection.error });
    }

    try {
      const { extractor, converter } = engine.getPipeline(selection.value);
      const phoneticMap = to === 'devanagari' ? extractor.buildPhoneticMap(extractor.extractTerms(body.text)) : {};
      res.json({ text: converter.convert(body.text, to, phoneticMap), to });
    } catch (error) {
      sendError(res, error, 'convert');
    }
  });

  // Quality metrics for a translation
  app.post('/api/evaluate', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.original !== 'string' || typeof body.translated !== 'string') {
      return res.status(400).json({ error: '"original" and "translated" must be strings' });
    }
    if (body.reference !== undefined && typeof body.reference !== 'string') {
      return res.status(400).json({ error: '"reference" must be a string' });
    }
    const reference = typeof body.reference === 'string' ? body.reference : undefined;

    const selection = parseSelection(body);
    if (!selection.ok) {
      return res.status(400).json({ error: selection.error });
    }

    try {
      const metrics = engine.getPipeline(selection.value).evaluateQuality(body.original, body.translated, reference);
      res.json(metrics);
    } catch (error) {
      sendError(res, error, 'evaluate');
    }
  });

  return app;
}

/**
 * Optional domain / targetLanguage / translator fields of a request body
 */
function parseSelection(body: Record<string, unknown>): Parsed<PipelineSelection> {
  const domain = typeof body.domain === 'string' ? body.domain : undefined;
  if (body.domain !== undefined && domain === undefined) {
    return { ok: false, error: '"domain" must be a string' };
  }

  const targetLanguage = isTargetLanguage(body.targetLanguage) ? body.targetLanguage : undefined;
  if (body.targetLanguage !== undefined && targetLanguage === undefined) {
    return { ok: false, error: '"targetLanguage" must be "hi" or "mr"' };
  }

  const translator = isTranslatorType(body.translator) ? body.translator : undefined;
  if (body.translator !== undefined && translator === undefined) {
    return { ok: false, error: '"translator" must be "baseline" or "llm"' };
  }

  return { ok: true, value: { domain, targetLanguage, translator } };
}

function parseScriptFormat(value: unknown): ScriptFormat | null {
  return value === 'roman' || value === 'devanagari' ? value : null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof GlossaryNotFoundError) {
    res.status(404).json({ error: `No glossary for domain '${error.domain}'`, code: error.code });
    return;
  }

  if (error instanceof TransliterationUnavailableError) {
    res.status(501).json({ error: error.message, code: error.code });
    return;
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  console.error(`[API] Failed to ${action}:`, message);
  res.status(500).json({ error: `Failed to ${action}: ${message}` });
}
