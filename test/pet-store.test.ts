// This test suite verifies SQLite pet persistence, normalization, search, and statistics.

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteStore } from '../src/db/database.js';
import { toTitleCase } from '../src/db/pet-fields.js';
import { SAMPLE_PETS, seedSamplePets } from '../src/db/seed.js';
import { AppError } from '../src/utils/errors.js';
import { makeTempDir, openStore, removeTempDir } from './helpers.js';

function captureAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an AppError to be thrown.');
}

describe('pet fields', () => {
  it('title-cases every word', () => {
    expect(toTitleCase('guinea PIG')).toBe('Guinea Pig');
    expect(toTitleCase('golden-retriever')).toBe('Golden-Retriever');
    expect(toTitleCase('dog')).toBe('Dog');
  });
});

describe('sqlite pet store', () => {
  let dir: string;
  let store: SqliteStore;

  beforeEach(() => {
    dir = makeTempDir();
    store = openStore(dir);
  });

  afterEach(() => {
    store.close();
    removeTempDir(dir);
  });

  it('normalizes fields on create', () => {
    const pet = store.createPet({ name: '  Rex ', species: 'guinea PIG', breed: '   ', age: 2 });

    expect(pet).toMatchObject({
      id: 1,
      name: 'Rex',
      species: 'Guinea Pig',
      breed: null,
      age: 2,
      description: null,
      is_adopted: false
    });
    expect(pet.created_at).toBe(pet.updated_at);
  });

  it('rejects blank names with a field-named message', () => {
    const error = captureAppError(() => store.createPet({ name: '   ', species: 'Dog' }));

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('validation_error');
    expect(error.message).toBe('Invalid argument "name": Name cannot be empty or whitespace only');
  });

  it('lists pets newest first', () => {
    store.createPet({ name: 'Alpha', species: 'Dog' });
    store.createPet({ name: 'Bravo', species: 'Cat' });
    store.createPet({ name: 'Charlie', species: 'Bird' });

    expect(store.listPets().map((pet) => pet.name)).toEqual(['Charlie', 'Bravo', 'Alpha']);
  });

  it('finds pets by case-insensitive name fragment', () => {
    const tweety = store.createPet({ name: 'Tweety', species: 'Bird' });

    expect(store.findPetByName('TWEE')?.id).toBe(tweety.id);
    expect(store.findPetByName('zzz')).toBeNull();
  });

  it('treats LIKE wildcards in name fragments literally', () => {
    store.createPet({ name: 'Ma_x', species: 'Dog' });
    store.createPet({ name: 'Max', species: 'Dog' });

    expect(store.findPetByName('a_')?.name).toBe('Ma_x');
    expect(store.findPetByName('%')).toBeNull();
  });

  it('rejects empty name fragments', () => {
    const error = captureAppError(() => store.findPetByName('   '));

    expect(error.code).toBe('validation_error');
    expect(error.message).toBe('Pet name to search for cannot be empty.');
  });

  it('inserts nothing when one batch entry is invalid', () => {
    const error = captureAppError(() =>
      store.createPetsBatch([
        { name: 'Valid', species: 'dog' },
        { name: '', species: 'cat' }
      ])
    );

    expect(error.message).toBe('Batch rejected: 1 invalid pet(s).');
    expect(error.details).toEqual({
      errors: ['Pet 2: Invalid argument "name": Name cannot be empty or whitespace only']
    });
    expect(store.listPets()).toEqual([]);
  });

  it('inserts a valid batch in one go', () => {
    const created = store.createPetsBatch([
      { name: 'One', species: 'dog' },
      { name: 'Two', species: 'cat', breed: 'maine coon' }
    ]);

    expect(created.map((pet) => pet.species)).toEqual(['Dog', 'Cat']);
    expect(created[1]?.breed).toBe('Maine Coon');
    expect(store.listPets()).toHaveLength(2);
  });

  it('applies partial updates and keeps unchanged pets on empty patches', () => {
    const pet = store.createPet({ name: 'Rex', species: 'Dog', age: 2 });

    const updated = store.updatePet(pet.id, { species: 'cat', age: 3 });
    expect(updated).toMatchObject({ name: 'Rex', species: 'Cat', age: 3 });

    expect(store.updatePet(pet.id, {})).toEqual(updated);
  });

  it('reports missing pets on update', () => {
    const error = captureAppError(() => store.updatePet(999, { name: 'Ghost' }));

    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('pet_not_found');
    expect(error.message).toBe('Pet with ID 999 not found');
  });

  it('adopts a pet exactly once', () => {
    const pet = store.createPet({ name: 'Rex', species: 'Dog' });

    expect(store.adoptPet(pet.id).is_adopted).toBe(true);

    const error = captureAppError(() => store.adoptPet(pet.id));
    expect(error.statusCode).toBe(409);
    expect(error.code).toBe('pet_already_adopted');
    expect(error.message).toBe('Rex is already adopted');
  });

  it('deletes by id or by name', () => {
    const rex = store.createPet({ name: 'Rex', species: 'Dog' });
    store.createPet({ name: 'Luna', species: 'Cat' });

    expect(store.deletePet(rex.id)).toBe(true);
    expect(store.deletePet(rex.id)).toBe(false);
    expect(store.deletePet('lun')).toBe(true);
    expect(store.deletePet('Ghost')).toBe(false);
    expect(store.listPets()).toEqual([]);
  });

  it('combines search filters', () => {
    store.createPet({ name: 'Old Dog', species: 'Dog', age: 9 });
    const young = store.createPet({ name: 'Young Dog', species: 'Dog', breed: 'beagle', age: 1 });
    const adopted = store.createPet({ name: 'Taken Dog', species: 'Dog', age: 2 });
    store.createPet({ name: 'Cat', species: 'Cat', age: 1 });
    store.adoptPet(adopted.id);

    expect(store.searchPets({ species: 'do' }).map((pet) => pet.name)).toEqual(['Taken Dog', 'Young Dog', 'Old Dog']);
    expect(store.searchPets({ species: 'dog', availableOnly: true, maxAge: 5 }).map((pet) => pet.id)).toEqual([young.id]);
    expect(store.searchPets({ breed: 'BEA' }).map((pet) => pet.id)).toEqual([young.id]);
    expect(store.searchPets({ minAge: 2 }).map((pet) => pet.name)).toEqual(['Taken Dog', 'Old Dog']);
    expect(store.listAvailablePets().map((pet) => pet.name)).toEqual(['Cat', 'Young Dog', 'Old Dog']);
  });

  it('summarizes adoption counts per species', () => {
    const rex = store.createPet({ name: 'Rex', species: 'Dog' });
    store.createPet({ name: 'Fido', species: 'Dog' });
    store.createPet({ name: 'Luna', species: 'Cat' });
    store.adoptPet(rex.id);

    expect(store.getSummary()).toEqual({
      species_stats: {
        Cat: { total: 1, adopted: 0, available: 1 },
        Dog: { total: 2, adopted: 1, available: 1 }
      },
      overall_totals: {
        total_pets: 3,
        adopted_pets: 1,
        available_pets: 2,
        adoption_rate: 33.33
      }
    });
  });

  it('reports a zero adoption rate for an empty catalog', () => {
    expect(store.getAdoptionStats()).toEqual({
      total_pets: 0,
      adopted_pets: 0,
      available_pets: 0,
      adoption_rate: 0,
      species_breakdown: {}
    });
  });

  it('merges stored species with the common options', () => {
    store.createPet({ name: 'Slinky', species: 'ferret' });

    expect(store.listValidSpecies()).toEqual({
      species: ['Bird', 'Cat', 'Dog', 'Ferret', 'Fish', 'Guinea Pig', 'Hamster', 'Rabbit', 'Reptile'],
      existing_in_database: ['Ferret'],
      common_options: ['Dog', 'Cat', 'Bird', 'Rabbit', 'Hamster', 'Guinea Pig', 'Fish', 'Reptile']
    });
  });

  it('seeds sample pets once', () => {
    expect(seedSamplePets(store)).toHaveLength(SAMPLE_PETS.length);
    expect(seedSamplePets(store)).toEqual([]);
    expect(store.listPets()).toHaveLength(SAMPLE_PETS.length);
  });
});
