export interface Evidence {
  id: string;
  title: string;
  description: string;
  visualDescription: string;
  imageUrl?: string;
}

export interface StoryLocation {
  id: string;
  name: string;
  description: string;
  imageUrl?: string;
}

export interface StoryCharacter {
  id: string;
  name: string;
  appearance: string;
  personality: string;   // Free text; also keys the fallback lines (nervous, arrogant, professional)
  knowledge: string;     // What the character knows, fed to the instruction turn
  heldEvidence: Evidence[];
  knownLocationIds: string[];
  imageUrl?: string;
}

export interface Story {
  id: string;
  title: string;
  summary: string;       // Player-facing case summary (the news article)
  fullStory: string;     // Ground truth shared with every character
  coverImageUrl?: string;
  startingLocationIds?: string[];
  characters: StoryCharacter[];
  locations: StoryLocation[];
}

export interface StorySummary {
  id: string;
  title: string;
  summary: string;
  coverImageUrl?: string;
}
