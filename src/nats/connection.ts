import { connect, Events, NatsConnection, ConnectionOptions } from 'nats';
import { logger } from '../config/logger.js';

const RECONNECT_DEFAULTS: ConnectionOptions = {
    reconnect: true,
    maxReconnectAttempts: -1,
    reconnectTimeWait: 2000,
};

export class NatsClient {
    private nc: NatsConnection | null = null;
    private connecting = false;
    private disconnected = false;
    private options: ConnectionOptions;

    constructor(options: ConnectionOptions) {
        this.options = { ...RECONNECT_DEFAULTS, ...options };
    }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers, name: this.options.name }, 'Connecting to NATS');

            const nc = await connect(this.options);
            this.nc = nc;
            this.disconnected = false;

            logger.info('Connected to NATS successfully');

            this.watchStatus(nc).catch((err) => {
                logger.error({ error: err }, 'NATS status watcher failed');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            switch (status.type) {
                case Events.Disconnect:
                    this.disconnected = true;
                    logger.warn({ data: status.data }, 'NATS disconnected');
                    break;
                case Events.Reconnect:
                    this.disconnected = false;
                    logger.info({ data: status.data }, 'NATS reconnected');
                    break;
                default:
                    logger.debug({ type: status.type, data: status.data }, 'NATS status update');
            }
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    /** False while the client waits to reconnect, so /health reports degraded. */
    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed() && !this.disconnected;
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}
