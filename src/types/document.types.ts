import { z } from 'zod';
import { CoordinatesSchema, OperationSchema } from '@/schemas/clientMessage.schema';

export type Operation = Readonly<z.infer<typeof OperationSchema>>;

export type Coordinates = z.infer<typeof CoordinatesSchema>;

/**
 * Last operation applied to a live buffer, kept so the next operation that
 * was produced against an older version can be transformed against it.
 */
export interface AppliedOperation {
  operation : Operation;
  connectionId : string;
  userId : string;
  version : number;
}

/**
 * In-memory text of a document being edited, keyed by documentId.
 */
export interface LiveBuffer {
  content : string;
  version : number;
  lastOperation : AppliedOperation | null;
  /**
   * Content as last loaded from or saved to the document service; null
   * when the load failed and the stored text is unknown.
   */
  lastPersisted : string | null;
}

export type LiveBuffersMap = Map<string, LiveBuffer>;
