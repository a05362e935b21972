export interface PushMessage {
  token: string;
  title: string;
  body: string;
  data?: Record<string, string>;
}

export interface PushGatewayPort {
  /** Resolves with the provider message id; rejects with PushDispatchFailure. */
  send(message: PushMessage): Promise<string>;
}
