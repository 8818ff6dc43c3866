/**
 * Conversation context types shared by the store, the dialogue manager and the orchestrator.
 */

export type Speaker = "user" | "assistant" | "system";

export interface Turn {
  timestamp: number;
  speaker: Speaker;
  text: string;
  intent: string | null;
  entities: Record<string, unknown>;
}

export interface ConversationContext {
  /** Last N turns, oldest first. */
  history: Turn[];
  currentIntent: string | null;
  entities: Record<string, unknown>;
  /** Latest vehicle snapshot; vehicle events are recorded under `events.<type>`. */
  vehicleState: Record<string, unknown>;
  userPreferences: Record<string, unknown>;
  systemStatus: Record<string, unknown>;
  /** Epoch ms of the last mutation. */
  lastUpdate: number;
}

/** Fields accepted by ContextStore.update(); history is only changed through appendTurn(). */
export type ContextUpdate = Partial<
  Pick<ConversationContext, "currentIntent" | "entities" | "vehicleState" | "userPreferences" | "systemStatus">
>;

export type TurnInput = Omit<Turn, "timestamp" | "intent" | "entities"> &
  Partial<Pick<Turn, "timestamp" | "intent" | "entities">>;
