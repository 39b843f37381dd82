import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';

export type LogParams = Record<string, string | number>;

const logParams = new WeakMap<Response, LogParams>();

/**
 * Attach pattern-specific parameters to the request's log line.
 */
export function setLogParams(res: Response, params: LogParams): void {
    logParams.set(res, { ...logParams.get(res), ...params });
}

/**
 * Returns an Express middleware that writes one structured line per request
 * once the response is finished or the connection closes: method, path,
 * status, duration, and any parameters the route attached. Requests the
 * client abandons are logged with `aborted: true`.
 */
export function requestLogMiddleware(logger: Logger) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const start = process.hrtime.bigint();
        let logged = false;

        const log = (): void => {
            if (logged) return;
            logged = true;

            const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
            logger.info(
                {
                    method: req.method,
                    path: req.originalUrl,
                    status: res.statusCode,
                    durationMs,
                    ...(res.writableFinished ? {} : { aborted: true }),
                    ...logParams.get(res),
                },
                'request'
            );
        };

        res.on('finish', log);
        res.on('close', log);

        next();
    };
}
