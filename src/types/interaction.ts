export interface LeadRecord {
  kind: 'lead';
  id: string;
  timestamp: string;
  name: string;
  email: string;
  intent: string;
  note: string;
  sessionId?: string;
}

export interface FeedbackQuestionRecord {
  kind: 'feedback_question';
  id: string;
  timestamp: string;
  question: string;
  context?: string;
  sessionId?: string;
}

export interface ServiceFeedbackRecord {
  kind: 'service_feedback';
  id: string;
  timestamp: string;
  name: string;
  email: string;
  serviceType: string;
  satisfaction: string;
  comments: string;
  sessionId?: string;
}

export type LogRecord = LeadRecord | FeedbackQuestionRecord | ServiceFeedbackRecord;

export type LogRecordKind = LogRecord['kind'];

type WithoutStamp<T> = T extends LogRecord ? Omit<T, 'id' | 'timestamp'> : never;

/** What callers hand to the sink; id and timestamp are assigned on append. */
export type LogRecordInput = WithoutStamp<LogRecord>;
