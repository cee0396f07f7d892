import { timingSafeEqual } from 'crypto';
import express from 'express';
import Busboy from 'busboy';
import { z } from 'zod';
import logger from '../utils/logger';
import { KnowledgeError, UnauthorizedError, ValidationError, describeError } from '../services/knowledge/errors';
import type { KnowledgeHandler } from '../services/knowledge/handler';

const log = logger.child({ module: 'HTTP' });

export interface KnowledgeRouterOptions {
  /** When set, every route requires `Authorization: Bearer <adminToken>`. */
  adminToken?: string;
  maxUploadBytes: number;
}

interface UploadedFile {
  filename: string;
  mimeType: string;
  data: Buffer;
}

interface MultipartForm {
  fields: Map<string, string[]>;
  file?: UploadedFile;
}

const CreateAgentBodySchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  description: z.string().default(''),
  tenant_id: z.string().default(''),
});

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

/** Hands rejections to the error middleware instead of leaving them unhandled. */
function asyncRoute(fn: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/**
 * Reads a multipart body into memory. Only the first part named `file` is kept;
 * anything past `maxFileBytes` fails the request with 413.
 */
function parseMultipart(req: express.Request, maxFileBytes: number): Promise<MultipartForm> {
  return new Promise((resolve, reject) => {
    let bb: ReturnType<typeof Busboy>;
    try {
      bb = Busboy({ headers: req.headers, limits: { fileSize: maxFileBytes, files: 1 } });
    } catch (err) {
      reject(new ValidationError(`invalid multipart request: ${describeError(err)}`, { cause: err }));
      return;
    }

    const fields = new Map<string, string[]>();
    let file: UploadedFile | undefined;
    let failure: KnowledgeError | undefined;

    bb.on('field', (name, value) => {
      fields.set(name, [...(fields.get(name) ?? []), value]);
    });

    bb.on('file', (name, stream, info) => {
      if (name !== 'file' || file) {
        stream.resume();
        return;
      }
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('limit', () => {
        failure = new ValidationError(`file exceeds the upload limit of ${maxFileBytes} bytes`, { status: 413 });
      });
      stream.on('end', () => {
        file = { filename: info.filename, mimeType: info.mimeType, data: Buffer.concat(chunks) };
      });
    });

    bb.on('error', (err: unknown) => {
      reject(new ValidationError(`invalid multipart request: ${describeError(err)}`, { cause: err }));
    });

    bb.on('close', () => {
      if (failure) {
        reject(failure);
      } else {
        resolve({ fields, file });
      }
    });

    req.pipe(bb);
  });
}

function firstField(form: MultipartForm, name: string): string {
  return form.fields.get(name)?.[0] ?? '';
}

function stringOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function tokenMatches(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}

function requireBearer(adminToken: string): express.RequestHandler {
  return (req, _res, next) => {
    const header = req.headers.authorization;
    if (!header) {
      next(new UnauthorizedError('no authorization header'));
      return;
    }
    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !tokenMatches(token ?? '', adminToken)) {
      next(new UnauthorizedError('invalid credentials', 403));
      return;
    }
    next();
  };
}

/** Maps thrown errors onto `{ success: false, error, code }`. */
export const errorMiddleware: express.ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof KnowledgeError) {
    const level = err.status >= 500 ? 'error' : 'warn';
    log[level]({ method: req.method, path: req.path, code: err.code, error: err.message }, 'Request failed');
    res.status(err.status).json({ success: false, error: err.message, code: err.code });
    return;
  }
  // express.json() reports malformed bodies as errors carrying a 4xx status
  if (typeof err === 'object' && err !== null && 'status' in err && err.status === 400) {
    res.status(400).json({ success: false, error: 'invalid request body', code: 'validation' });
    return;
  }
  log.error({ method: req.method, path: req.path, error: describeError(err) }, 'Unhandled request error');
  res.status(500).json({ success: false, error: 'internal server error', code: 'internal' });
};

/** JSON management API for knowledge files and agents, mounted under /api/knowledge. */
export function createKnowledgeRouter(handler: KnowledgeHandler, options: KnowledgeRouterOptions): express.Router {
  const router = express.Router();

  if (options.adminToken) {
    router.use(requireBearer(options.adminToken));
  }
  router.use(express.json());

  router.post(
    '/upload',
    asyncRoute(async (req, res) => {
      const form = await parseMultipart(req, options.maxUploadBytes);
      if (!form.file) {
        throw new ValidationError('failed to get file from form');
      }
      const response = await handler.upload({
        name: firstField(form, 'name'),
        description: firstField(form, 'description'),
        agentIds: form.fields.get('agent_ids') ?? [],
        filename: form.file.filename,
        content: form.file.data,
        contentType: form.file.mimeType,
      });
      res.json(response);
    }),
  );

  router.get('/files', (req, res) => {
    res.json(handler.listFiles(stringOf(req.query.agent_id) || undefined));
  });

  router.get('/files/:id', (req, res) => {
    res.json(handler.getFile(req.params.id));
  });

  router.delete(
    '/files/:id',
    asyncRoute(async (req, res) => {
      res.json(await handler.deleteFile(req.params.id));
    }),
  );

  router.get('/agents', (_req, res) => {
    res.json(handler.listAgents());
  });

  router.get('/agents/:id', (req, res) => {
    res.json(handler.getAgent(req.params.id));
  });

  router.post(
    '/agents/create',
    asyncRoute(async (req, res) => {
      const body = CreateAgentBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new ValidationError('invalid request body', { cause: body.error });
      }
      res.json(await handler.createAgent(body.data));
    }),
  );

  router.get(
    '/context/:agentId',
    asyncRoute(async (req, res) => {
      res.json(await handler.getContext(req.params.agentId));
    }),
  );

  router.get('/health', (_req, res) => {
    res.json(handler.health());
  });

  router.use(errorMiddleware);
  return router;
}
