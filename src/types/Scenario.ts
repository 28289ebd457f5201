export interface ScenarioOption {
  title: string;
  hook: string;     // One-line premise shown on the choice card
  details: string;  // Markdown DM notes: setting, plot, quest, NPCs, locations
}

export interface NamedEntity {
  name: string;
  description?: string;
}
