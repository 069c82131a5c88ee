export interface GroupMetrics {
  group : string;
  consumers : number;
  pending : number;
  acked : number;
  lastDeliveredPosition : string;
}

export interface TopicMetrics {
  topic : string;
  /** null when the log could not be reached for this topic */
  entries : number | null;
  groups : GroupMetrics[];
}

export interface EventMetrics {
  topics : TopicMetrics[];
  deadLetterDepth : number;
}
