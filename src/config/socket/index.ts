import http from 'http';
import { Server } from "socket.io";
import { config } from "..";
import { ClientToServerEvents, CollabServer, CollabSocketData, ServerToClientEvents } from './socketManager.interface';

export function createSocketServer(httpServer : http.Server) : CollabServer {
    const origins = config.CLIENT_URL ? config.CLIENT_URL.split(',').map((origin) => origin.trim()) : [];
    const io : CollabServer = new Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, CollabSocketData>(httpServer,{
        cors : { origin : origins, credentials : true, methods : ['GET','POST'] },
        pingTimeout : 60000,
        pingInterval : 25000,
        perMessageDeflate : false,
    });
    return io;
}
