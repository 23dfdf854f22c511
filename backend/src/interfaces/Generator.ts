import { Turn } from '../types/Agent.js';
import { Story, StoryCharacter } from '../types/Story.js';

/** The slice of a turn the generator needs; transient turns are built ad hoc. */
export type GeneratorTurn = Pick<Turn, 'role' | 'fullText'>;

export interface GenerateOptions {
  /** Request the `{ reply, revealed_evidences, revealed_locations }` object */
  structured: boolean;
  /** Trailing turns that are one-off reminders rather than conversation */
  transientTurns?: number;
}

/**
 * Text generator behind a character. Implementations reject on network or
 * backend failure; they never post-process the text beyond transport concerns.
 */
export interface Generator {
  generate(turns: readonly GeneratorTurn[], options: GenerateOptions): Promise<string>;
}

/** Renders the opening instruction turn for a character. */
export interface InstructionBuilder {
  buildInstruction(story: Story, character: StoryCharacter): string;
}
