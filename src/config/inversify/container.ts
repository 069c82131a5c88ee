import 'reflect-metadata'
import { Container } from "inversify";
import TYPES from './types'
import { config } from '@/config';
import { createRedisClient } from '@/config/redis';
import { SocketManager } from '../socket/socketManager';
import { IEventLog } from '@/providers/interfaces/IEventLog.interface';
import { RedisStreamEventLog } from '@/providers/redisStreamEventLog';
import { IDocumentStore } from '@/providers/interfaces/IDocumentStore.interface';
import { HttpDocumentStore, HttpDocumentStoreOptions } from '@/providers/httpDocumentStore';
import { IIdentityProvider } from '@/providers/interfaces/IIdentityProvider.interface';
import { GatewayIdentityProvider } from '@/providers/gatewayIdentityProvider';
import { EventRegistry } from '@/services/eventRegistry';
import { IEventPublisher } from '@/services/interfaces/eventPublisher.service.interface';
import { EventPublisher } from '@/services/eventPublisher.service';
import { EventStore } from '@/services/eventStore.service';
import { EventMonitor } from '@/services/eventMonitor.service';
import { ISessionManager } from '@/services/interfaces/sessionManager.service.interface';
import { SessionManager } from '@/services/sessionManager.service';
import { PresenceTracker } from '@/services/presence.service';
import { ICollaborationService } from '@/services/interfaces/collaboration.service.interface';
import { CollaborationService } from '@/services/collaboration.service';
import { CircuitBreaker } from '@/utils/circuitBreaker';
import { Clock, systemClock } from '@/utils/clock';

/** Builds a fresh event log, each on its own Redis connection. */
export type EventLogFactory = (name : string) => IEventLog;

export function buildContainer() : Container {
    const container = new Container();

    container
        .bind<Clock>(TYPES.Clock)
        .toConstantValue(systemClock);

    // Event backbone
    container
        .bind<EventLogFactory>(TYPES.EventLogFactory)
        .toConstantValue((name) => new RedisStreamEventLog(createRedisClient(name)));

    container
        .bind<IEventLog>(TYPES.IEventLog)
        .toDynamicValue((context) => context.container.get<EventLogFactory>(TYPES.EventLogFactory)('event-log'))
        .inSingletonScope();

    container
        .bind<EventRegistry>(TYPES.EventRegistry)
        .to(EventRegistry).inSingletonScope();

    container
        .bind<IEventPublisher>(TYPES.IEventPublisher)
        .to(EventPublisher).inSingletonScope();

    container
        .bind<EventStore>(TYPES.EventStore)
        .to(EventStore).inSingletonScope();

    container
        .bind<EventMonitor>(TYPES.EventMonitor)
        .to(EventMonitor).inSingletonScope();

    // External collaborators
    container
        .bind<CircuitBreaker>(TYPES.DocumentServiceBreaker)
        .toDynamicValue((context) => new CircuitBreaker({
            name : 'document-service',
            failureThreshold : config.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
            recoveryMs : config.CIRCUIT_BREAKER_RECOVERY_MS,
            clock : context.container.get<Clock>(TYPES.Clock),
        }))
        .inSingletonScope();

    container
        .bind<HttpDocumentStoreOptions>(TYPES.HttpDocumentStoreOptions)
        .toConstantValue({
            baseUrl : config.DOCUMENT_SERVICE_URL,
            timeoutMs : config.DOCUMENT_SERVICE_TIMEOUT_MS,
        });

    container
        .bind<IDocumentStore>(TYPES.IDocumentStore)
        .to(HttpDocumentStore).inSingletonScope();

    container
        .bind<IIdentityProvider>(TYPES.IIdentityProvider)
        .to(GatewayIdentityProvider).inSingletonScope();

    // Live collaboration
    container
        .bind<ISessionManager>(TYPES.ISessionManager)
        .to(SessionManager).inSingletonScope();

    container
        .bind<PresenceTracker>(TYPES.PresenceTracker)
        .to(PresenceTracker).inSingletonScope();

    container
        .bind<ICollaborationService>(TYPES.ICollaborationService)
        .to(CollaborationService).inSingletonScope();

    container
        .bind<SocketManager>(TYPES.SocketManager)
        .to(SocketManager).inSingletonScope();

    return container;
}

const container = buildContainer();

export default container;
