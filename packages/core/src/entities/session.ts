import { type ChatMessage } from './message';

/**
 * The live, ordered conversation of one session.
 *
 * Messages are only ever appended; there is no cap here. The retention window
 * applies when a history is hydrated from storage, not while it is in use.
 */
export class SessionHistory {
  private readonly entries: ChatMessage[] = [];

  public constructor(
    public readonly sessionId: string,
    initial: readonly ChatMessage[] = []
  ) {
    this.entries.push(...initial);
  }

  public get messages(): readonly ChatMessage[] {
    return this.entries;
  }

  public get length(): number {
    return this.entries.length;
  }

  public append(message: ChatMessage): void {
    this.entries.push(message);
  }
}
