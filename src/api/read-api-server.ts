import { createServer, type Server } from 'node:http';
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import type { ItemReader } from '../storage/item-store.js';
import { InputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { requestLogMiddleware } from './middleware/request-log.js';
import { authorRoute, keywordRoute, paperRoute, recentRoute, searchRoute } from './routes/papers.js';

export interface ReadApiServerOptions {
    /** Store handle shared by every request; created once at startup. */
    store: ItemReader;
    logger?: Logger;
}

/**
 * Read-only Express API over the paper table.
 *
 * Routes:
 *  GET /papers/recent?category=&limit=       – newest papers in a category
 *  GET /papers/author/<name>                 – all papers by an author
 *  GET /papers/keyword/<kw>?limit=           – newest papers with a keyword
 *  GET /papers/search?category=&start=&end=  – category papers in a date range
 *  GET /papers/<arxiv_id>                    – one paper, or 404
 */
export class ReadApiServer {
    private readonly app: express.Application;
    private readonly logger: Logger;
    private server: Server | null = null;

    constructor(opts: ReadApiServerOptions) {
        this.logger = opts.logger ?? getLogger();
        this.app = this.buildApp(opts.store);
    }

    private buildApp(store: ItemReader): express.Application {
        const app = express();
        app.disable('x-powered-by');
        app.use(requestLogMiddleware(this.logger));

        app.get('/papers/recent', recentRoute(store));
        app.get('/papers/search', searchRoute(store));
        app.get(/^\/papers\/author\/(.*)$/, authorRoute(store));
        app.get(/^\/papers\/keyword\/(.*)$/, keywordRoute(store));
        app.get(/^\/papers\/(.*)$/, paperRoute(store));

        app.use((_req: Request, res: Response) => {
            res.status(404).json({ error: 'not found' });
        });

        app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
            if (error instanceof InputError) {
                res.status(400).json({ error: error.message });
                return;
            }
            if (error instanceof URIError) {
                res.status(400).json({ error: 'malformed path' });
                return;
            }
            this.logger.error({ err: error, method: req.method, path: req.originalUrl }, 'Unhandled request failure');
            res.status(500).json({ error: 'server error' });
        });

        return app;
    }

    /**
     * Start listening. Resolves with the bound port (useful with port 0).
     */
    start(port: number, host = '0.0.0.0'): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = createServer(this.app);
            server.on('error', reject);
            server.listen(port, host, () => {
                this.server = server;
                const address = server.address();
                const bound = typeof address === 'object' && address !== null ? address.port : port;
                this.logger.info({ port: bound }, 'Read API listening');
                resolve(bound);
            });
        });
    }

    /**
     * Stop the server.
     */
    stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) {
                resolve();
                return;
            }
            this.server.close((err) => {
                if (err) reject(err);
                else {
                    this.server = null;
                    this.logger.info('Read API stopped');
                    resolve();
                }
            });
        });
    }

    /**
     * Expose the underlying Express app.
     */
    get expressApp(): express.Application {
        return this.app;
    }
}
