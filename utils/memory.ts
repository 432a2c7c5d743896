import type { ChartData, ExecutionPlan, Message, MessageRole } from '../types';

export const DEFAULT_MAX_MESSAGES = 5;
export const NO_CONVERSATION = 'No previous conversation.';
export const NO_CONTEXT = 'No context available.';

/**
 * Conversation history for follow-up questions, plus the cached description
 * of the active dataset. Only the most recent `maxMessages` entries are kept.
 */
export class ConversationMemory {
  private log: Message[] = [];
  private schema: string | null = null;
  private dataframeInfo: string | null = null;

  constructor(readonly maxMessages: number = DEFAULT_MAX_MESSAGES) {
    if (!Number.isInteger(maxMessages) || maxMessages < 1) {
      throw new RangeError(`maxMessages must be a positive integer, got ${maxMessages}`);
    }
  }

  get messages(): readonly Message[] {
    return this.log;
  }

  get dataSchema(): string | null {
    return this.schema;
  }

  get currentDataframeInfo(): string | null {
    return this.dataframeInfo;
  }

  addMessage(role: MessageRole, content: string, executionPlan?: ExecutionPlan, chartData?: ChartData): void {
    const last = this.log[this.log.length - 1];
    // Clock adjustments must not reorder the log.
    const now = Math.max(Date.now(), last ? last.timestamp.getTime() : 0);
    const message: Message = { role, content, timestamp: new Date(now) };
    if (executionPlan) message.executionPlan = executionPlan;
    if (chartData) message.chartData = chartData;

    this.log.push(message);
    if (this.log.length > this.maxMessages) {
      this.log = this.log.slice(-this.maxMessages);
    }
  }

  getContext(): string {
    if (this.log.length === 0) {
      return NO_CONVERSATION;
    }
    return this.log.map((msg) => `${msg.role === 'user' ? 'User' : 'Assistant'}: ${msg.content}`).join('\n');
  }

  getLastUserQuery(): string | undefined {
    for (let i = this.log.length - 1; i >= 0; i--) {
      if (this.log[i].role === 'user') return this.log[i].content;
    }
    return undefined;
  }

  getLastAssistantResponse(): Message | undefined {
    for (let i = this.log.length - 1; i >= 0; i--) {
      if (this.log[i].role === 'assistant') return this.log[i];
    }
    return undefined;
  }

  setDataSchema(schema: string): void {
    this.schema = schema;
  }

  setDataframeInfo(info: string): void {
    this.dataframeInfo = info;
  }

  // Drops the message log only; the dataset description stays.
  clearMessages(): void {
    this.log = [];
  }

  clear(): void {
    this.log = [];
    this.schema = null;
    this.dataframeInfo = null;
  }

  /**
   * Schema, dataframe info and conversation, in that order, each block only
   * when it has content.
   */
  getFullContext(): string {
    const parts: string[] = [];

    if (this.schema) {
      parts.push(`DATA SCHEMA:\n${this.schema}`);
    }
    if (this.dataframeInfo) {
      parts.push(`DATAFRAME INFO:\n${this.dataframeInfo}`);
    }
    if (this.log.length > 0) {
      parts.push(`CONVERSATION HISTORY:\n${this.getContext()}`);
    }

    return parts.length > 0 ? parts.join('\n\n') : NO_CONTEXT;
  }
}
