/**
 * Work items handed from the events gate to the agent pipeline.
 */

export type MentionJob = {
  conversationId: string;
  channelId: string;
  text: string;
  userId?: string;
  /** History length seen by the gate when the job was dispatched. */
  priorMessageCount: number;
};

export type FeedbackJob = {
  reactionName: string;
  /** ts of the message that was reacted to. */
  conversationId: string;
  channelId: string;
  userId?: string;
};

/**
 * Receives recognized events. Both calls return immediately; the work runs
 * detached and reports its own failures.
 */
export interface SlackEventSink {
  process(job: MentionJob): void;
  recordFeedback(job: FeedbackJob): void;
}
