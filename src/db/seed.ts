// This module seeds the demo catalog used by local runs and walkthroughs.

import type { Pet, PetInput, PetStore } from '../types/domain.js';

export const SAMPLE_PETS: readonly PetInput[] = [
  {
    name: 'Buddy',
    species: 'Dog',
    breed: 'Golden Retriever',
    age: 3,
    description: 'Friendly and energetic dog who loves to play fetch. Great with kids and other pets.'
  },
  {
    name: 'Whiskers',
    species: 'Cat',
    breed: 'Persian',
    age: 2,
    description: 'Calm and gentle cat who enjoys lounging in sunny spots. Perfect for a quiet home.'
  },
  {
    name: 'Tweety',
    species: 'Bird',
    breed: 'Canary',
    age: 1,
    description: 'Singing bird with bright yellow feathers.'
  },
  {
    name: 'Max',
    species: 'Dog',
    breed: 'Labrador',
    age: 4,
    description: 'Loyal and intelligent dog. Great for families and loves outdoor activities.'
  },
  {
    name: 'Luna',
    species: 'Cat',
    breed: 'Siamese',
    age: 2,
    description: 'Elegant and social cat with striking blue eyes. Very affectionate and vocal.'
  }
];

// Skips any sample whose exact name already exists, so repeated runs stay idempotent.
export function seedSamplePets(store: PetStore): Pet[] {
  const existingNames = new Set(store.listPets().map((pet) => pet.name));
  const missing = SAMPLE_PETS.filter((sample) => !existingNames.has(sample.name));

  if (missing.length === 0) {
    return [];
  }

  return store.createPetsBatch(missing);
}
