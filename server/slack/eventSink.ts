import type { BackgroundTasks } from "../services/backgroundTasks";
import type { KeyedSerialQueue } from "../services/serialQueue";
import { handleFeedback, type FeedbackHandlerDeps } from "./feedbackHandler";
import { handleMentionJob, type MentionHandlerDeps } from "./messageHandler";
import type { FeedbackJob, MentionJob, SlackEventSink } from "./types";

export interface AgentEventSinkDeps {
  background: BackgroundTasks;
  threads: KeyedSerialQueue;
  mention: MentionHandlerDeps;
  feedback: FeedbackHandlerDeps;
}

/**
 * Runs gate work in the background. Mentions of one thread are queued so each
 * agent turn sees the previous turn's history and appends after it.
 */
export class AgentEventSink implements SlackEventSink {
  constructor(private readonly deps: AgentEventSinkDeps) {}

  process(job: MentionJob): void {
    void this.deps.background.run(`handle message in ${job.channelId}/${job.conversationId}`, () =>
      this.deps.threads.enqueue(job.conversationId, () => handleMentionJob(job, this.deps.mention)),
    );
  }

  recordFeedback(job: FeedbackJob): void {
    void this.deps.background.run(`feedback ${job.reactionName} on ${job.channelId}/${job.conversationId}`, () =>
      handleFeedback(job, this.deps.feedback),
    );
  }
}
