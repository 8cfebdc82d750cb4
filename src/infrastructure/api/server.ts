import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import bodyParser from 'body-parser';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { toTaskDto } from '../../domain/task/dtos/TaskDto.js';
import type { TaskStore } from '../../domain/task/services/TaskStore.js';
import { TaskStoreRegistry } from '../session/TaskStoreRegistry.js';
import { taskFilterSchema } from '../../application/schemas/commonSchemas.js';
import type { ServerConfig } from '../serverConfigLoader.js';

const taskIdParamSchema = z.coerce.number().int().positive();
const taskTextBodySchema = z.object({ text: z.string() });
const filterQuerySchema = taskFilterSchema.optional().default('all');

export type ApiServerOptions = Pick<ServerConfig, 'port' | 'rateLimitWindowMs' | 'rateLimitMax' | 'sessionHeader'>;

const defaultOptions: ApiServerOptions = {
  port: 3000,
  rateLimitWindowMs: 15 * 60 * 1000,
  rateLimitMax: 100,
  sessionHeader: 'x-session-id'
};

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}

export class ApiServer {
  private app: express.Application;
  private options: ApiServerOptions;
  private registry: TaskStoreRegistry;
  private httpServer: Server | undefined;

  constructor(options: Partial<ApiServerOptions> = {}, registry: TaskStoreRegistry = new TaskStoreRegistry()) {
    this.app = express();
    this.options = { ...defaultOptions, ...options };
    this.registry = registry;
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    // Security middleware
    this.app.use(helmet());
    this.app.use(cors({ exposedHeaders: [this.options.sessionHeader] }));

    this.app.use(rateLimit({
      windowMs: this.options.rateLimitWindowMs,
      limit: this.options.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
    }));

    this.app.use(bodyParser.json());
  }

  /**
   * Name the caller's session, minting an id when none was sent
   */
  private sessionIdFor(req: Request, res: Response): string {
    const sessionId = req.get(this.options.sessionHeader) || uuidv4();
    res.setHeader(this.options.sessionHeader, sessionId);
    return sessionId;
  }

  /**
   * The caller's task store, created on first write
   */
  private storeFor(req: Request, res: Response): TaskStore {
    return this.registry.get(this.sessionIdFor(req, res));
  }

  /**
   * The caller's task store if the session already exists; never registers one
   */
  private existingStoreFor(req: Request, res: Response): TaskStore | undefined {
    const sessionId = this.sessionIdFor(req, res);
    return this.registry.has(sessionId) ? this.registry.get(sessionId) : undefined;
  }

  private parseTaskId(req: Request, res: Response): number | undefined {
    const parsed = taskIdParamSchema.safeParse(req.params.id);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid task id' });
      return undefined;
    }
    return parsed.data;
  }

  private parseText(req: Request, res: Response): string | undefined {
    const parsed = taskTextBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Body must be an object with a string "text" field' });
      return undefined;
    }
    if (!parsed.data.text.trim()) {
      res.status(400).json({ error: 'Task text must not be blank' });
      return undefined;
    }
    return parsed.data.text;
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (req: Request, res: Response) => {
      res.status(200).json({ status: 'ok' });
    });

    this.app.get('/tasks', (req: Request, res: Response) => {
      const filter = filterQuerySchema.safeParse(req.query.filter);
      if (!filter.success) {
        res.status(400).json({ error: 'filter must be one of all, completed, incomplete' });
        return;
      }
      const store = this.existingStoreFor(req, res);
      res.status(200).json(store ? store.filtered(filter.data).map(toTaskDto) : []);
    });

    this.app.get('/tasks/statistics', (req: Request, res: Response) => {
      const store = this.existingStoreFor(req, res);
      res.status(200).json(store ? store.statistics() : { total: 0, completed: 0, pending: 0 });
    });

    this.app.post('/tasks', (req: Request, res: Response) => {
      const text = this.parseText(req, res);
      if (text === undefined) return;

      const store = this.storeFor(req, res);
      const id = store.nextId;
      store.create(text);
      const task = store.getTaskById(id);
      if (!task) {
        res.status(400).json({ error: 'Task was not created' });
        return;
      }
      res.status(201).json(toTaskDto(task));
    });

    this.app.post('/tasks/complete-all', (req: Request, res: Response) => {
      const store = this.existingStoreFor(req, res);
      const updated = store ? store.statistics().pending : 0;
      store?.markAllCompleted();
      res.status(200).json({ updated });
    });

    this.app.delete('/tasks', (req: Request, res: Response) => {
      this.existingStoreFor(req, res)?.deleteAll();
      res.status(204).send();
    });

    this.app.patch('/tasks/:id', (req: Request, res: Response) => {
      const id = this.parseTaskId(req, res);
      if (id === undefined) return;
      const store = this.existingStoreFor(req, res);
      if (!store || !store.getTaskById(id)) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      const text = this.parseText(req, res);
      if (text === undefined) return;

      store.update(id, text);
      const task = store.getTaskById(id);
      if (!task) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      res.status(200).json(toTaskDto(task));
    });

    this.app.post('/tasks/:id/toggle', (req: Request, res: Response) => {
      const id = this.parseTaskId(req, res);
      if (id === undefined) return;
      const store = this.existingStoreFor(req, res);

      store?.toggle(id);
      const task = store?.getTaskById(id);
      if (!task) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      res.status(200).json(toTaskDto(task));
    });

    this.app.delete('/tasks/:id', (req: Request, res: Response) => {
      const id = this.parseTaskId(req, res);
      if (id === undefined) return;
      const store = this.existingStoreFor(req, res);
      if (!store || !store.getTaskById(id)) {
        res.status(404).json({ error: 'Task not found' });
        return;
      }
      store.delete(id);
      res.status(204).send();
    });

    // End a session and discard its tasks
    this.app.delete('/session', (req: Request, res: Response) => {
      const sessionId = req.get(this.options.sessionHeader);
      if (!sessionId || !this.registry.drop(sessionId)) {
        res.status(404).json({ error: 'Session not found' });
        return;
      }
      res.status(204).send();
    });
  }

  private setupErrorHandling(): void {
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParseError(error)) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      console.error('Error handling request:', error);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start listening
   * @returns the bound port
   */
  public start(host?: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, host ?? '0.0.0.0', () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
        console.log(`API server listening on port ${port}`);
        resolve(port);
      });
      server.on('error', reject);
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return Promise.resolve();
    }
    this.httpServer = undefined;
    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
