export type MessageHandler = (topic: string, payload: Buffer) => void;

export type Unsubscribe = () => Promise<void>;

/**
 * Minimal publish/subscribe surface shared by the edge and dashboard
 * runtimes. Publishing resolves once the broker has accepted the message.
 */
export interface PubSubTransport {
  publish(topic: string, payload: string): Promise<void>;
  subscribe(topicFilter: string, handler: MessageHandler): Promise<Unsubscribe>;
  close(): Promise<void>;
  isConnected(): boolean;
}
