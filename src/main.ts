// src/main.ts

import { loadConfig } from './config';
import { createLogger, describeError } from './logger';
import { HTTPResponse } from './http_writer';
import { Resource, ResourceReply } from './resource';
import { WebServer } from './server';
import { HTTPRequest } from './types';

interface Customer {
    firstname?: unknown;
    lastname?: unknown;
}

const customers = new Map<string, Customer>([
    ['1', { firstname: 'Alex', lastname: 'River' }],
    ['2', { firstname: 'Lannie', lastname: 'Fox' }],
]);
let nextId = 3;

const notFound = () => new ResourceReply({ message: 'no such customer' }, 404);

const customerList: Resource = {
    get: () => Object.fromEntries(customers),
    post: (data) => {
        customers.set(String(nextId++), data);
        return new ResourceReply({ message: 'created' }, 201);
    },
};

const customer: Resource = {
    get: (_data, { id }) => customers.get(id) ?? notFound(),
    put: (data, { id }) => {
        if (!customers.has(id)) return notFound();
        customers.set(id, data);
        return { message: 'updated' };
    },
    delete: (_data, { id }) => {
        if (!customers.delete(id)) return notFound();
        return { message: 'successfully deleted' };
    },
};

async function index(_req: HTTPRequest, res: HTTPResponse) {
    await res.startHtml();
    await res.send('<html><body><h1>Hello, world! (<a href="/table">table</a>)</h1></body></html>\n');
}

async function table(_req: HTTPRequest, res: HTTPResponse) {
    await res.startHtml();
    await res.send('<html><body><h1>Simple table</h1><table border=1 width=400>');
    for (let i = 0; i < 10; i++) {
        await res.send(`<tr><td>Name${i}</td><td>Value${i}</td></tr>`);
    }
    await res.send('</table></body></html>\n');
}

const config = loadConfig();
const logger = createLogger(config.logLevel);
const app = new WebServer(config, { logger });

app.route('/', index);
app.route('/index.html', index);
app.route('/table', table);
app.route('/redirect', (_req, res) => res.redirect('/'));
app.route('/images/<fn>', (req, res) => res.sendFile(`static/images/${req.params.fn}`, { contentType: 'image/jpeg' }));
app.addResource('/customers', customerList, { maxBodySize: 4096 });
app.addResource('/customers/<id>', customer, { maxBodySize: 4096 });

// --- Graceful Shutdown ---
const gracefulShutdown = (signal: string) => {
    logger.info('shutting down', { signal });
    app.shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
            logger.error('shutdown failed', describeError(err));
            process.exit(1);
        },
    );
};
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

app.start().catch((err: unknown) => {
    logger.error('failed to start', describeError(err));
    process.exit(1);
});
