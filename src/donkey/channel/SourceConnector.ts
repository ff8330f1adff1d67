/**
 * Purpose: Base class for source connectors that receive incoming text
 *
 * Key behaviors:
 * - Received text is handed to a single MessageHandler, one piece at a time
 * - dispatchRawMessage() resolves only after the handler has finished, so a
 *   connector can hold back the next piece until the current one is processed
 */

/**
 * Consumer of a source connector's decoded text.
 */
export interface MessageHandler {
  (text: string): Promise<void>;
}

export interface SourceConnectorConfig {
  name: string;
  transportName: string;
}

export abstract class SourceConnector {
  protected name: string;
  protected transportName: string;
  protected running = false;
  private handler: MessageHandler | null = null;

  constructor(config: SourceConnectorConfig) {
    this.name = config.name;
    this.transportName = config.transportName;
  }

  getName(): string {
    return this.name;
  }

  getTransportName(): string {
    return this.transportName;
  }

  isRunning(): boolean {
    return this.running;
  }

  setMessageHandler(handler: MessageHandler): void {
    this.handler = handler;
  }

  /**
   * Hand decoded text to the handler.
   *
   * @throws Error when no handler has been attached
   */
  protected async dispatchRawMessage(text: string): Promise<void> {
    if (!this.handler) {
      throw new Error(`${this.name} has no message handler`);
    }
    await this.handler(text);
  }

  abstract start(): Promise<void>;

  abstract stop(): Promise<void>;
}
