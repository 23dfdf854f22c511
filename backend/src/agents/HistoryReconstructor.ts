import { ConversationLog } from '../interfaces/ConversationLog.js';
import { InstructionBuilder } from '../interfaces/Generator.js';
import { StoryProvider } from '../interfaces/StoryProvider.js';
import { Agent, AgentRecord, PersistedTurn, Turn } from '../types/Agent.js';
import { Story, StoryCharacter } from '../types/Story.js';
import { errorMessage, invalidAgentState, notFound } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { extractClientText, isInstructionText } from '../utils/turnContent.js';
import { CapabilityModel } from './CapabilityModel.js';
import { CONTINUATION_INSTRUCTION } from './CharacterAgent.js';

export interface HistoryReconstructorDeps {
  conversationLog: ConversationLog;
  stories: StoryProvider;
  instructions: InstructionBuilder;
}

/**
 * Rebuilds an agent that is no longer in memory from the durable log.
 *
 * The result always opens with an instruction turn at index 0, has
 * contiguous indices, and carries reveal sets recomputed from its character
 * turns and clipped to what the character could ever reveal. When the
 * stored history had to be repaired the log is rewritten to match.
 */
export class HistoryReconstructor {
  private readonly log = createLogger(NAMESPACES.agents.reconstructor);

  constructor(private readonly deps: HistoryReconstructorDeps) {}

  async reconstruct(agentId: string): Promise<Agent> {
    const record = await this.deps.conversationLog.getAgent(agentId);
    if (!record) {
      throw notFound(`Agent ${agentId} not found`, { agentId });
    }
    if (!record.storyRef) {
      throw invalidAgentState(`Agent ${agentId} has no story reference`, { agentId });
    }

    const stored = await this.deps.conversationLog.listTurns(agentId);
    const source = stored
      .filter(turn => turn.fullText.trim() !== '')
      .sort((a, b) => a.index - b.index);
    const skipped = stored.length - source.length;

    const instruction = await this.resolveInstruction(record, source[0]);
    const conversation = (isOpeningInstruction(source[0]) ? source.slice(1) : source)
      .filter(turn => turn.role !== 'instruction');

    const history: Turn[] = [instruction, ...conversation].map((turn, index) => toTurn(turn, index));
    const changed =
      skipped > 0 ||
      history.length !== stored.length ||
      history.some((turn, index) => {
        const before = source[index];
        return !before || before.index !== turn.index || before.role !== turn.role || before.fullText !== turn.fullText;
      });

    if (changed) {
      this.log('[RECONSTRUCT] rewriting stored history agent=%s stored=%d kept=%d', agentId, stored.length, history.length);
      try {
        await this.deps.conversationLog.replaceTurns(agentId, history);
      } catch (error) {
        this.log('[RECONSTRUCT] could not rewrite history agent=%s: %s', agentId, errorMessage(error));
      }
    }

    const capability = new CapabilityModel(record.heldEvidenceIds, record.knownLocationIds);
    const revealedEvidenceIds = new Set<string>();
    const revealedLocationIds = new Set<string>();
    for (const turn of history) {
      if (turn.role !== 'character') continue;
      for (const id of turn.revealedEvidenceIds) if (capability.holds(id)) revealedEvidenceIds.add(id);
      for (const id of turn.revealedLocationIds) if (capability.knows(id)) revealedLocationIds.add(id);
    }

    this.log('[RECONSTRUCT] agent=%s turns=%d evidence=%d locations=%d', agentId, history.length, revealedEvidenceIds.size, revealedLocationIds.size);
    return {
      id: record.id,
      storyRef: record.storyRef,
      characterRef: record.characterRef,
      characterName: record.characterName,
      personality: record.personality,
      heldEvidenceIds: capability.heldEvidenceIds,
      knownLocationIds: capability.knownLocationIds,
      revealedEvidenceIds,
      revealedLocationIds,
      history,
      reconstructedFromStore: true
    };
  }

  /**
   * Fresh instruction from current story data when the character still
   * exists; otherwise the stored opening instruction, or a generic one.
   */
  private async resolveInstruction(record: AgentRecord, first: PersistedTurn | undefined): Promise<Turn> {
    const source = await this.loadCharacter(record);
    let fullText: string;
    if (source) {
      fullText = this.deps.instructions.buildInstruction(source.story, source.character);
    } else if (first && isOpeningInstruction(first)) {
      fullText = first.fullText;
    } else {
      this.log('[RECONSTRUCT] story data missing for agent=%s, using continuation instruction', record.id);
      fullText = CONTINUATION_INSTRUCTION;
    }
    return {
      role: 'instruction',
      index: 0,
      fullText,
      clientText: '',
      timestamp: first && isOpeningInstruction(first) ? first.timestamp : record.createdAt,
      revealedEvidenceIds: [],
      revealedLocationIds: []
    };
  }

  private async loadCharacter(record: AgentRecord): Promise<{ story: Story; character: StoryCharacter } | null> {
    try {
      const story = await this.deps.stories.getStory(record.storyRef);
      const character = story?.characters.find(candidate => candidate.id === record.characterRef);
      return story && character ? { story, character } : null;
    } catch (error) {
      this.log('[RECONSTRUCT] story lookup failed agent=%s: %s', record.id, errorMessage(error));
      return null;
    }
  }
}

function isOpeningInstruction(turn: Turn | undefined): boolean {
  return !!turn && (turn.role === 'instruction' || isInstructionText(turn.fullText));
}

function toTurn(turn: Turn, index: number): Turn {
  const role = index === 0 ? 'instruction' : turn.role;
  return {
    role,
    index,
    fullText: turn.fullText,
    clientText: role === 'instruction' ? '' : turn.clientText || extractClientText(role, turn.fullText),
    timestamp: turn.timestamp,
    revealedEvidenceIds: [...turn.revealedEvidenceIds],
    revealedLocationIds: [...turn.revealedLocationIds]
  };
}
