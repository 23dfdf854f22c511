export type TurnRole = 'instruction' | 'user' | 'character';

export interface Turn {
  role: TurnRole;
  index: number;
  fullText: string;     // Exactly what the generator sees
  clientText: string;   // What the player may see; '' for instruction turns
  timestamp: string;    // ISO 8601
  revealedEvidenceIds: string[];
  revealedLocationIds: string[];
}

export interface Agent {
  id: string;
  storyRef: string;
  characterRef: string;
  characterName: string;
  personality: string;
  heldEvidenceIds: ReadonlySet<string>;
  knownLocationIds: ReadonlySet<string>;
  revealedEvidenceIds: Set<string>;
  revealedLocationIds: Set<string>;
  history: Turn[];
  reconstructedFromStore: boolean;
}

/** Static part of an agent as kept by the durable log. */
export interface AgentRecord {
  id: string;
  storyRef: string;
  characterRef: string;
  characterName: string;
  personality: string;
  heldEvidenceIds: string[];
  knownLocationIds: string[];
  createdAt: string;
}

export interface PersistedTurn extends Turn {
  agentId: string;
  tokenCount: number;
}

export interface TurnResult {
  reply: string;
  revealedEvidenceIds: string[];
  revealedLocationIds: string[];
}

export interface SendMessageInput {
  text: string;
  presentedEvidenceIds?: string[];
  locationId?: string;
}

export interface HistoryMessage {
  index: number;
  role: TurnRole;
  content: string;
  timestamp: string;
  revealedEvidenceIds: string[];
  revealedLocationIds: string[];
}

export interface HistoryPage {
  agentId: string;
  characterName: string;
  messages: HistoryMessage[];
  total: number;
  hasMore: boolean;
}
