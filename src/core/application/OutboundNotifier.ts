import type { ChatTransport, Config, OutboxJob } from '../ports';
import { withTimeout } from '../utils/async';

export type TemplateRenderer = (template: string, data?: Record<string, unknown>) => string;

/**
 * Delivers queued notices to the chat transport.
 *
 * Every dispatch carries the identity the notice was queued with, so a retry
 * after a timeout re-sends the same message rather than a new one.
 */
export class OutboundNotifier {
  constructor(
    private readonly transport: ChatTransport,
    private readonly config: Config,
    private readonly render: TemplateRenderer,
  ) {}

  async deliver(job: OutboxJob): Promise<void> {
    const { callTimeoutMs } = this.config.timings();
    const payload = this.render(this.templateFor(job.template), job.data);

    await withTimeout(`dispatch ${job.identity}`, callTimeoutMs, (signal) =>
      this.transport.dispatch({ conversationId: job.conversationId, identity: job.identity, payload }, signal),
    );

    if (job.kind === 'archive') {
      await withTimeout(`archive ${job.conversationId}`, callTimeoutMs, (signal) =>
        this.transport.archive(job.conversationId, job.identity, signal),
      );
    }
  }

  // Keys look like "transition.RESOLVED", "lifecycle.warning" or "communication"
  private templateFor(key: string): string {
    const templates = this.config.messaging();
    const [group, name] = key.split('.', 2);

    let template: string | undefined;
    if (group === 'communication') {
      template = templates.communication;
    } else if (group === 'transition' && name) {
      template = templates.transition[name];
    } else if (group === 'lifecycle' && name) {
      template = templates.lifecycle[name];
    }

    if (template === undefined) {
      throw new Error(`Message template "${key}" is not configured`);
    }
    return template;
  }
}
