import { AppliedOperation, Coordinates, Operation } from './document.types';

// --- Server-to-Client Messages ---

/**
 * Sent only to a client that just joined: current text, its version and
 * everyone's cursor.
 * @type 'initial_state'
 */
export interface ServerInitialState {
  type : 'initial_state';
  documentId : string;
  content : string;
  version : number;
  cursors : Record<string, Coordinates>;
}

export interface ServerDocumentChange {
  type : 'document_change';
  operation : Operation;
  userId : string;
  version : AppliedOperation['version'];
  timestamp : string;
}

export interface ServerCursorPosition {
  type : 'cursor_position';
  userId : string;
  cursor : Coordinates;
  timestamp : string;
}

export interface ServerDocumentSaved {
  type : 'document_saved';
  userId : string;
  version : number;
  timestamp : string;
  [extra : string] : unknown;
}

export interface ServerPresenceChange {
  type : 'user_joined' | 'user_left';
  userId : string;
  timestamp : string;
}

/**
 * Payload for an error message sent from the server.
 * @type 'error'
 */
export interface ServerError {
  type : 'error';
  message : string;
  code? : string;
}

export type ServerMessage =
  | ServerInitialState
  | ServerDocumentChange
  | ServerCursorPosition
  | ServerDocumentSaved
  | ServerPresenceChange
  | ServerError;

/**
 * One live client connection, whatever the transport.
 */
export interface IConnection {
  readonly id : string;
  readonly userId : string;
  send(message : ServerMessage) : void | Promise<void>;
}

export interface Session {
  documentId : string;
  userId : string;
  connection : IConnection;
  joinedAt : number;
}

export interface BroadcastReport {
  delivered : number;
  failed : number;
}
