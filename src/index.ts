import http from 'http'
import container from "./config/inversify/container";
import TYPES from "./config/inversify/types";
import { SocketManager } from "./config/socket/socketManager";
import { createSocketServer } from "./config/socket";
import { createHttpApp } from "./http/app";
import { EventMonitor } from "./services/eventMonitor.service";
import { ICollaborationService } from "./services/interfaces/collaboration.service.interface";
import { IEventLog } from "./providers/interfaces/IEventLog.interface";
import logger, { describeError } from "./utils/pinoLogger";
import { config } from "./config";

const socketManager = container.get<SocketManager>(TYPES.SocketManager);
const collaboration = container.get<ICollaborationService>(TYPES.ICollaborationService);
const monitor = container.get<EventMonitor>(TYPES.EventMonitor);
const eventLog = container.get<IEventLog>(TYPES.IEventLog);

const app = createHttpApp({ monitor, connectionCount : () => socketManager.connectionCount() });
const server = http.createServer(app);
const io = createSocketServer(server);

let deadLetterTimer : NodeJS.Timeout | undefined;

const startServer = async () => {
    try {
        logger.info('Initializing socket manager...')
        socketManager.init(io);
        logger.info('Socket manager initilized successfully');

        const PORT = config.SOCKET_PORT
        server.listen(PORT, () => {
            logger.info(`HTTP/Socket.IO server listening on port ${PORT}`);
        });

        // Periodic job: alert on dead-lettered events
        deadLetterTimer = setInterval(async () => {
            try {
                await monitor.checkDeadLetter(config.DEAD_LETTER_ALERT_THRESHOLD);
            } catch (err) {
                logger.error('Failed to check dead letter topic', describeError(err));
            }
        }, config.METRICS_POLL_INTERVAL_MS);
    } catch (error) {
        logger.error('Failed to start server : ', describeError(error));
        process.exit(1);
    }
};

let shuttingDown = false;
const shutdown = async (signal : string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down...`);
    clearInterval(deadLetterTimer);
    try {
        await collaboration.shutdown();
        await io.close();
        await eventLog.close();
        logger.info('Shutdown complete');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', describeError(error));
        process.exit(1);
    }
};

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

void startServer();
