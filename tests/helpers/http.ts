import type { Server } from 'http';
import type { Express } from 'express';

export interface RunningServer {
    server: Server;
    url: string;
}

/** Starts `app` on an ephemeral local port. */
export const listen = (app: Express): Promise<RunningServer> =>
    new Promise((resolve, reject) => {
        const server = app.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('server is not listening on a TCP port'));
                return;
            }
            resolve({ server, url: `http://127.0.0.1:${address.port}` });
        });
    });

export const close = (server: Server): Promise<void> =>
    new Promise((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
    });
