// This file centralizes pet domain models and the store contract consumed by REST routes and MCP tools.

export const COMMON_SPECIES = ['Dog', 'Cat', 'Bird', 'Rabbit', 'Hamster', 'Guinea Pig', 'Fish', 'Reptile'] as const;

export interface Pet {
  id: number;
  name: string;
  species: string;
  breed: string | null;
  age: number | null;
  description: string | null;
  is_adopted: boolean;
  created_at: string;
  updated_at: string;
}

export interface PetInput {
  name: string;
  species: string;
  breed?: string | null;
  age?: number | null;
  description?: string | null;
}

export type PetPatch = Partial<PetInput>;

export interface PetSearchFilters {
  species?: string;
  breed?: string;
  availableOnly?: boolean;
  minAge?: number;
  maxAge?: number;
}

export interface AdoptionCounts {
  total: number;
  adopted: number;
  available: number;
}

export interface PetsSummary {
  species_stats: Record<string, AdoptionCounts>;
  overall_totals: {
    total_pets: number;
    adopted_pets: number;
    available_pets: number;
    adoption_rate: number;
  };
}

export interface AdoptionStats {
  total_pets: number;
  adopted_pets: number;
  available_pets: number;
  adoption_rate: number;
  species_breakdown: Record<string, AdoptionCounts>;
}

export interface ValidSpecies {
  species: string[];
  existing_in_database: string[];
  common_options: string[];
}

// Every operation is atomic from the caller's perspective; failures surface as AppError codes
// pet_not_found, pet_already_adopted, or validation_error.
export interface PetStore {
  listPets(): Pet[];
  getPet(id: number): Pet | null;
  findPetByName(fragment: string): Pet | null;
  createPet(input: PetInput): Pet;
  // Entries arrive unvalidated; the store checks every one before inserting any.
  createPetsBatch(inputs: readonly unknown[]): Pet[];
  updatePet(id: number, patch: PetPatch): Pet;
  adoptPet(id: number): Pet;
  deletePet(idOrName: number | string): boolean;
  searchPets(filters: PetSearchFilters): Pet[];
  listAvailablePets(): Pet[];
  getSummary(): PetsSummary;
  listValidSpecies(): ValidSpecies;
  getAdoptionStats(): AdoptionStats;
}
