import { Server, Socket } from "socket.io";
import { ServerMessage } from "@/types/client-server.types";

export interface ServerToClientEvents {
  message : (message : ServerMessage) => void;
}

export interface ClientToServerEvents {
  message : (raw : unknown) => void;
}

export interface CollabSocketData {
  userId : string;
  documentId : string;
}

export type CollabServer = Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, CollabSocketData>;
export type CollabSocket = Socket<ClientToServerEvents, ServerToClientEvents, Record<string, never>, CollabSocketData>;

export interface ISocketManager {
  /**
   * Attach connection handling to the Socket.IO server.
   * Called once during application startup.
   *
   * @param io - An initialized Socket.IO server instance
   */
  init(io: CollabServer): void;

  /** Number of sockets currently attached. */
  connectionCount(): number;
}
