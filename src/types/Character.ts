export interface Character {
  // Core Fields (identity)
  name: string;
  description: string;    // Short bio and look

  // Abilities & Role
  abilities: readonly string[];    // Skills, powers and notable gear (e.g., ["tracking", "longbow"])

  // Attributes
  strength: number;
  intelligence: number;
  agility: number;
  maximumHealth: number;
  currentHealth: number;
}
