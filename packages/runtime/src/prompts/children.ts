import { UnknownChildError } from '@worksheetbot/core';

export interface ChildProfile {
  name    : string;
  age     : number;
  /** Who the child is and what they love, in a sentence or two. */
  about   : string;
  /** What this child's worksheets should exercise. */
  focus   : string;
}

export const CHILD_PROFILES: readonly ChildProfile[] = [
  {
    name: 'Landon',
    age: 7,
    about: 'He has high functioning autism and loves race cars, rockets, toys, and stars.',
    focus: 'Worksheets should be structured with math, word problems, and comparisons.'
  },
  {
    name: 'Declan',
    age: 5,
    about: 'He loves colorful worksheets with playful Disney-style energy, Pokémon creatures, and Sprunkies.',
    focus: 'Worksheets should be simpler with counting, matching, and easy add/subtract.'
  }
];

export function findChildProfile(name: string): ChildProfile {
  const wanted = name.trim().toLowerCase();
  const profile = CHILD_PROFILES.find((candidate) => candidate.name.toLowerCase() === wanted);
  if (!profile) {
    throw new UnknownChildError(name, CHILD_PROFILES.map((candidate) => candidate.name));
  }
  return profile;
}
