import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import { SpanKind } from '@opentelemetry/api';
import { NotFoundError, ValidationError } from '../errors';
import { OrchestrationEngine } from '../services/orchestration-engine';
import { RuntimeStatus } from '../db/instance.entity';
import { TraceContext, withSpan } from '../observability/tracing';

const TAG = '[http]';

export interface HttpServerOptions {
    engine: Pick<OrchestrationEngine, 'start' | 'status' | 'purge'>;
    trace: TraceContext;
    /** Base for the URLs handed back to callers; derived from the request when null. */
    publicBaseUrl: string | null;
    /** Resolves when every backing store answers. */
    healthCheck: () => Promise<void>;
}

type WorkflowParams = { workflowName: string };
type InstanceParams = { id: string };

function isFinished(status: RuntimeStatus): boolean {
    return status === 'Completed' || status === 'Failed';
}

function baseUrl(request: FastifyRequest, configured: string | null): string {
    if (configured) return configured;
    return `${request.protocol}://${request.hostname}`;
}

function instanceUris(base: string, id: string) {
    const uri = `${base}/instances/${encodeURIComponent(id)}`;
    return { statusQueryGetUri: uri, purgeHistoryDeleteUri: uri };
}

/** HTTP trigger and management surface for orchestrations. */
export function createHttpServer(options: HttpServerOptions): FastifyInstance {
    const { engine, trace, publicBaseUrl, healthCheck } = options;
    const app = Fastify({ logger: false });

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof ValidationError) {
            void reply.status(400).send({ error: error.message });
            return;
        }
        // body parser and schema errors carry their own 4xx
        if (error.statusCode !== undefined && error.statusCode < 500) {
            void reply.status(error.statusCode).send({ error: error.message });
            return;
        }
        console.error(`${TAG} ${request.method} ${request.url} failed:`, error);
        void reply.status(500).send({ error: 'internal error' });
    });

    app.post<{ Params: WorkflowParams; Body: unknown }>('/orchestrators/:workflowName', async (request, reply) => {
        const { workflowName } = request.params;
        const input = request.body ?? null;

        return withSpan(trace, 'http_start', async (span, child) => {
            let id: string;
            try {
                id = await engine.start(workflowName, input, child);
            } catch (err) {
                if (err instanceof NotFoundError) {
                    return reply.status(404).send({ error: err.message });
                }
                throw err;
            }

            span.setAttribute('durable.instance_id', id);
            const uris = instanceUris(baseUrl(request, publicBaseUrl), id);
            console.log(`${TAG} started ${workflowName} as ${id}`);
            return reply
                .status(202)
                .header('Location', uris.statusQueryGetUri)
                .send({ id, ...uris });
        }, { 'function.name': workflowName, 'http.method': 'POST' }, SpanKind.SERVER);
    });

    app.get<{ Params: InstanceParams }>('/instances/:id', async (request, reply) => {
        const status = await engine.status(request.params.id);
        if (!status) {
            return reply.status(404).send({ error: `instance ${request.params.id} not found` });
        }
        return reply.status(isFinished(status.runtimeStatus) ? 200 : 202).send(status);
    });

    app.delete<{ Params: InstanceParams }>('/instances/:id', async (request, reply) => {
        const result = await engine.purge(request.params.id);
        switch (result) {
            case 'deleted':
                return reply.status(200).send({ instancesDeleted: 1 });
            case 'not_terminal':
                return reply.status(409).send({ error: `instance ${request.params.id} is still running` });
            case 'not_found':
                return reply.status(404).send({ error: `instance ${request.params.id} not found` });
        }
    });

    app.get('/health', async (_request, reply) => {
        try {
            await healthCheck();
            return reply.status(200).send({ status: 'ok' });
        } catch (err) {
            console.error(`${TAG} health check failed:`, err);
            return reply.status(503).send({ status: 'unavailable' });
        }
    });

    return app;
}
