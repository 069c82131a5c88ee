import { inject, injectable } from 'inversify';
import { Dispatcher, request } from 'undici';
import { z } from 'zod';
import TYPES from '@/config/inversify/types';
import { config } from '@/config';
import { IDocumentStore } from './interfaces/IDocumentStore.interface';
import { TransportError } from '@/errors/collab.errors';
import { CircuitBreaker } from '@/utils/circuitBreaker';
import logger from '@/utils/pinoLogger';

const DocumentResponseSchema = z.object({
    content : z.string().nullable().optional(),
});

export interface HttpDocumentStoreOptions {
    baseUrl : string;
    timeoutMs : number;
    dispatcher? : Dispatcher;
}

/**
 * Document service client: `GET /documents/:id` and
 * `PUT /documents/:id` with `{ content }`, behind a circuit breaker.
 */
@injectable()
export class HttpDocumentStore implements IDocumentStore {
    #_breaker : CircuitBreaker
    #_options : HttpDocumentStoreOptions

    constructor(
        @inject(TYPES.DocumentServiceBreaker) breaker : CircuitBreaker,
        @inject(TYPES.HttpDocumentStoreOptions) options : HttpDocumentStoreOptions
    ){
        this.#_breaker = breaker
        this.#_options = options
    }

    async load(documentId : string) : Promise<string> {
        return this.#_breaker.execute(async () => {
            const { statusCode, body } = await this.send('GET', documentId);
            if (statusCode === 404) {
                await body.dump();
                logger.info(`Document ${documentId} not found in document service; starting empty.`);
                return '';
            }
            if (statusCode >= 400) {
                await body.dump();
                throw new TransportError(`Document service answered ${statusCode} loading ${documentId}`);
            }
            const parsed = DocumentResponseSchema.safeParse(await body.json());
            if (!parsed.success) {
                throw new TransportError(`Document service sent an unexpected body for ${documentId}`);
            }
            return parsed.data.content ?? '';
        });
    }

    async save(documentId : string, content : string) : Promise<void> {
        await this.#_breaker.execute(async () => {
            const { statusCode, body } = await this.send('PUT', documentId, JSON.stringify({ content }));
            await body.dump();
            if (statusCode >= 400) {
                throw new TransportError(`Document service answered ${statusCode} saving ${documentId}`);
            }
            logger.debug(`Saved document ${documentId}`, { length : content.length });
        });
    }

    private async send(method : 'GET' | 'PUT', documentId : string, payload? : string) : Promise<Dispatcher.ResponseData> {
        const url = `${this.#_options.baseUrl.replace(/\/$/, '')}/documents/${encodeURIComponent(documentId)}`;
        try {
            return await request(url, {
                method,
                body : payload,
                headers : {
                    'content-type' : 'application/json',
                    'x-service-name' : config.SERVICE_NAME,
                },
                headersTimeout : this.#_options.timeoutMs,
                bodyTimeout : this.#_options.timeoutMs,
                dispatcher : this.#_options.dispatcher,
            });
        } catch (error) {
            throw new TransportError(`Document service unreachable (${method} ${documentId})`, { cause : error });
        }
    }
}
