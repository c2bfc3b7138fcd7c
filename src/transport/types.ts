export interface InboundMessage {
  sender: string;
  group: string;
  text: string;
  timestamp: number;
  mentions: string[];
}

export interface SendResult {
  success: boolean;
  attempts: number;
  error?: string;
}

export interface TransportHealth {
  receiving: boolean;
  sending: boolean;
  consecutiveReceiveFailures: number;
  consecutiveSendFailures: number;
}

/**
 * Chat transport. `receive` yields messages until the signal aborts and may be
 * called again after it ends.
 */
export interface Transport {
  receive(signal: AbortSignal): AsyncIterable<InboundMessage>;
  send(text: string, group?: string): Promise<SendResult>;
  health(): TransportHealth;
}
