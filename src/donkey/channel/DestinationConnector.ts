/**
 * Purpose: Base class for destination connectors that deliver classified messages
 *
 * Key behaviors:
 * - send() delivers one message to the bucket chosen by its classification key
 *   and resolves to a description of where it went (e.g. the file path)
 * - start()/stop() bracket any resources the destination holds
 */

export interface DestinationConnectorConfig {
  name: string;
  transportName: string;
}

export abstract class DestinationConnector {
  protected name: string;
  protected transportName: string;
  protected running = false;

  constructor(config: DestinationConnectorConfig) {
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

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  /**
   * Deliver a message. `key` is null for unclassified messages.
   */
  abstract send(key: string | null, message: string): Promise<string>;
}
