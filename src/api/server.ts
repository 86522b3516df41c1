import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { NatsClient } from '../nats/connection.js';
import { Metrics } from '../metrics/counter.js';
import { EvaluationService } from '../service/evaluation.js';

const MAX_BODY_BYTES = 64 * 1024;

export class PayloadTooLargeError extends Error {
    constructor(public readonly limit: number) {
        super(`Request body exceeds ${limit} bytes`);
        this.name = 'PayloadTooLargeError';
    }
}

/**
 * Collect the request body. Past the limit the rest is drained unbuffered
 * so the client can still read the 413 answer.
 */
function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size > MAX_BODY_BYTES) {
                chunks.length = 0;
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            if (size > MAX_BODY_BYTES) {
                reject(new PayloadTooLargeError(MAX_BODY_BYTES));
                return;
            }
            resolve(Buffer.concat(chunks).toString('utf-8'));
        });
        req.on('error', reject);
    });
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private natsClient: NatsClient,
        private metrics: Metrics,
        private validator: SchemaValidator,
        private service: EvaluationService,
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err) => {
                logger.error({ error: err }, 'Request handling failed');
                if (!res.headersSent) {
                    sendJson(res, 500, { error: 'Internal error' });
                }
            });
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const { method, url } = req;

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        if (method === 'GET' && url === '/health') {
            this.handleHealth(res);
        } else if (method === 'GET' && url === '/metrics') {
            this.handleMetrics(res);
        } else if (method === 'POST' && url === '/evaluate') {
            await this.handleEvaluate(req, res);
        } else {
            sendJson(res, 404, { error: 'Not found' });
        }
    }

    private handleHealth(res: ServerResponse): void {
        const isNatsConnected = this.natsClient.isConnected();

        sendJson(res, isNatsConnected ? 200 : 503, {
            status: isNatsConnected ? 'ok' : 'degraded',
            nats: {
                connected: isNatsConnected,
            },
            mode: this.service.mode,
            timestamp: new Date().toISOString(),
        });
    }

    private handleMetrics(res: ServerResponse): void {
        sendJson(res, 200, {
            ...this.metrics.getCounters(),
            timestamp: new Date().toISOString(),
        });
    }

    private async handleEvaluate(req: IncomingMessage, res: ServerResponse): Promise<void> {
        this.metrics.incrementReceived();

        let raw: string;
        try {
            raw = await readBody(req);
        } catch (err) {
            if (!(err instanceof PayloadTooLargeError)) {
                throw err;
            }
            logger.warn({ limit: err.limit }, 'Evaluate request body too large');
            this.metrics.incrementDroppedInvalid();
            sendJson(res, 413, { error: err.message });
            return;
        }

        let body: unknown;
        try {
            body = JSON.parse(raw);
        } catch (err) {
            logger.warn({ error: err }, 'Invalid evaluate request body');
            this.metrics.incrementDroppedInvalid();
            sendJson(res, 400, { error: 'Body must be valid JSON' });
            return;
        }

        const validationResult = this.validator.validateEvaluateRequest(body);
        if (!validationResult.valid) {
            this.metrics.incrementDroppedInvalid();
            sendJson(res, 400, { error: validationResult.errors });
            return;
        }

        this.metrics.incrementValidated();
        const request = validationResult.data;
        const evaluation = 'samples' in request
            ? this.service.evaluate(request.samples)
            : this.service.evaluateText(request.text);

        if (evaluation.summary.points === 0) {
            sendJson(res, 422, { error: 'No integer samples found in input' });
            return;
        }

        sendJson(res, 200, { mode: this.service.mode, ...evaluation });
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.port }, 'HTTP API server started');
                resolve();
            });
        });
    }

    /** Port actually bound, which differs from the configured one when started on port 0. */
    boundPort(): number | null {
        const address = this.server.address();
        return typeof address === 'object' && address !== null ? address.port : null;
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
