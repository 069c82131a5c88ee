import container, { EventLogFactory } from "./config/inversify/container";
import TYPES from "./config/inversify/types";
import { config } from "./config";
import { StreamTopics } from "./config/streams/streamTopics";
import { EventConsumer } from "./services/eventConsumer.service";
import { EventRegistry } from "./services/eventRegistry";
import { EventRouter } from "./services/eventRouter";
import { ActivityProjection } from "./modules/activity/activityProjection";
import { IEventLog } from "./providers/interfaces/IEventLog.interface";
import logger, { describeError } from "./utils/pinoLogger";

const ACTIVITY_GROUP = 'activity-projector';
const ACTIVITY_TOPICS = [StreamTopics.COLLABORATION, StreamTopics.DOCUMENT];

const registry = container.get<EventRegistry>(TYPES.EventRegistry);
const createEventLog = container.get<EventLogFactory>(TYPES.EventLogFactory);

const projection = new ActivityProjection();
const router = projection.attach(new EventRouter());

const logs : IEventLog[] = [];
const consumers = ACTIVITY_TOPICS.map((topic) => {
    const eventLog = createEventLog(`${ACTIVITY_GROUP}:${topic}`);
    logs.push(eventLog);
    return new EventConsumer(eventLog, registry, {
        topic,
        group : ACTIVITY_GROUP,
        consumer : `${config.PODNAME}-${topic}`,
        handler : router.route,
    });
});

const startWorker = async () => {
    try {
        for (const consumer of consumers) {
            await consumer.start();
        }
        logger.info(`Activity worker consuming ${ACTIVITY_TOPICS.join(', ')}`);
    } catch (error) {
        logger.error('Failed to start activity worker', describeError(error));
        process.exit(1);
    }
};

let shuttingDown = false;
const shutdown = async (signal : string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Stopping consumers...`);
    try {
        await Promise.all(consumers.map((consumer) => consumer.stop()));
        await Promise.all(logs.map((eventLog) => eventLog.close()));
        logger.info('Activity worker stopped', { documents : projection.all().length });
        process.exit(0);
    } catch (error) {
        logger.error('Error during worker shutdown', describeError(error));
        process.exit(1);
    }
};

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

void startWorker();
