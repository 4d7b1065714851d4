/**
 * Chat domain types shared by services, routes and the socket gateway
 */

export interface Passage {
  readonly id: string;
  readonly text: string;
  readonly embedding?: readonly number[];
}

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

export type Transport = 'websocket' | 'http' | 'voice';

export interface EmotionalState {
  readonly name: string;
  readonly cue: string;
}

export interface Intent {
  readonly quoteRequest: boolean;
  readonly quoteCount: number;
  readonly emotion: EmotionalState | null;
}

export type ChatMessageRole = 'system' | 'user' | 'assistant';

/** One entry of an OpenAI-compatible `messages` array. */
export interface ChatMessage {
  role: ChatMessageRole;
  content: string;
}

export interface PassageView {
  id: string;
  text: string;
}

export interface ChatResult {
  sessionId: string;
  reply: string;
  passages: PassageView[];
  fallback: boolean;
  transport: Transport;
  timestamp: string;
}
