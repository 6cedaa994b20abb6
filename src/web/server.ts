/**
 * @fileoverview kawaii-olog web server and REST API
 *
 * Exposes the design operations over a Fastify HTTP API:
 * - `POST /api/designs` generates a design specification
 * - `GET /api/archetypes` and `GET /api/archetypes/:name` serve archetype rules
 * - `GET /api/taxonomy` lists the design dimensions
 * - `GET /api/health` reports readiness
 *
 * @module web/server
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { DEFAULT_HOST, DEFAULT_PORT } from '../config/defaults.js';
import { DesignService } from '../design-service.js';
import { formatZodIssues, generateDesignRequestSchema } from '../schemas.js';
import type { SpecificationRepository } from '../spec-repository.js';
import {
  ApiErrorCode,
  createErrorResponse,
  createSuccessResponse,
  type ApiResponse,
  type ArchetypeRulesView,
  type ArchetypeSummary,
  type DesignSpecification,
} from '../types.js';

/** Dimension as served by `GET /api/taxonomy` */
interface TaxonomyEntry {
  name: string;
  typeName: string;
  description: string;
  instances: string[];
}

export interface WebServerOptions {
  port?: number;
  host?: string;
}

export class WebServer {
  private app: FastifyInstance;
  private service: DesignService;
  private repository: SpecificationRepository;
  private port: number;
  private host: string;
  private routesReady: boolean = false;

  constructor(repository: SpecificationRepository, options: WebServerOptions = {}) {
    this.repository = repository;
    this.service = new DesignService(repository);
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host ?? DEFAULT_HOST;
    this.app = Fastify({ logger: false });
  }

  /**
   * Registers routes once and returns the Fastify instance.
   * Tests drive it with `inject()` without listening.
   */
  async getApp(): Promise<FastifyInstance> {
    if (!this.routesReady) {
      this.setupRoutes();
      this.routesReady = true;
      await this.app.ready();
    }
    return this.app;
  }

  private setupRoutes(): void {
    this.app.get('/api/health', async (): Promise<ApiResponse<{ status: string; archetypes: number; dimensions: number }>> => {
      return createSuccessResponse({
        status: 'ok',
        archetypes: this.repository.allArchetypes().length,
        dimensions: this.repository.dimensions().length,
      });
    });

    this.app.get('/api/taxonomy', async (): Promise<ApiResponse<TaxonomyEntry[]>> => {
      const entries = this.repository.dimensions().map((name) => {
        const dimension = this.repository.dimension(name);
        return {
          name,
          typeName: dimension.typeName,
          description: dimension.description,
          instances: [...dimension.instances],
        };
      });
      return createSuccessResponse(entries);
    });

    this.app.get('/api/archetypes', async (): Promise<ApiResponse<ArchetypeSummary[]>> => {
      return createSuccessResponse(this.service.listArchetypes());
    });

    this.app.get<{ Params: { name: string } }>(
      '/api/archetypes/:name',
      async (req, reply): Promise<ApiResponse<ArchetypeRulesView>> => {
        const lookup = this.service.getArchetypeRules(req.params.name);
        if (!lookup.found) {
          reply.code(404);
          return createErrorResponse(ApiErrorCode.NOT_FOUND, lookup.error.message);
        }
        return createSuccessResponse(lookup.rules);
      }
    );

    this.app.post('/api/designs', async (req, reply): Promise<ApiResponse<DesignSpecification>> => {
      const parsed = generateDesignRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        reply.code(400);
        return createErrorResponse(ApiErrorCode.INVALID_INPUT, formatZodIssues(parsed.error));
      }
      const { userPrompt, designIntent } = parsed.data;
      const design = this.service.generateDesign(userPrompt, designIntent);
      console.log(`[web] Generated ${design.characterName} (${design.archetype}, seed ${design.designSeed})`);
      return createSuccessResponse(design);
    });
  }

  async start(): Promise<void> {
    const app = await this.getApp();
    await app.listen({ port: this.port, host: this.host });
    console.log(`kawaii-olog API running at http://localhost:${this.port}`);
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}

/**
 * Create and start a web server on the given port.
 */
export async function startWebServer(
  repository: SpecificationRepository,
  options: WebServerOptions = {}
): Promise<WebServer> {
  const server = new WebServer(repository, options);
  await server.start();
  return server;
}
