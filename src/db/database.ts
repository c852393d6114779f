// This module owns SQLite initialization and persistence operations for the pet catalog.

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  COMMON_SPECIES,
  type AdoptionCounts,
  type AdoptionStats,
  type Pet,
  type PetInput,
  type PetPatch,
  type PetSearchFilters,
  type PetStore,
  type PetsSummary,
  type ValidSpecies
} from '../types/domain.js';
import { AppError, describeFirstIssue } from '../utils/errors.js';
import { parsePetInput, parsePetPatch, petInputSchema } from './pet-fields.js';

interface PetRow {
  id: number;
  name: string;
  species: string;
  breed: string | null;
  age: number | null;
  description: string | null;
  is_adopted: number;
  created_at: string;
  updated_at: string;
}

interface SpeciesCountRow {
  species: string;
  total: number;
  adopted: number;
}

const PET_COLUMNS = 'id, name, species, breed, age, description, is_adopted, created_at, updated_at';
const NEWEST_FIRST = 'ORDER BY created_at DESC, id DESC';

function mapPetRow(row: PetRow): Pet {
  return {
    id: row.id,
    name: row.name,
    species: row.species,
    breed: row.breed,
    age: row.age,
    description: row.description,
    is_adopted: row.is_adopted === 1,
    created_at: row.created_at,
    updated_at: row.updated_at
  };
}

// This helper escapes LIKE wildcards so user fragments match literally.
function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// Percentage with two decimals; an empty catalog reports 0.
function adoptionRate(adopted: number, total: number): number {
  if (total === 0) {
    return 0;
  }

  return Math.round((adopted / total) * 100 * 100) / 100;
}

// This store is synchronous because SQLite calls are local and bounded.
export class SqliteStore implements PetStore {
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    if (dbPath !== ':memory:' && !existsSync(dirname(dbPath))) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        species TEXT NOT NULL,
        breed TEXT,
        age INTEGER CHECK (age IS NULL OR age >= 0),
        description TEXT,
        is_adopted INTEGER NOT NULL DEFAULT 0 CHECK (is_adopted IN (0, 1)),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pets_name ON pets(name);
      CREATE INDEX IF NOT EXISTS idx_pets_species ON pets(species);
      CREATE INDEX IF NOT EXISTS idx_pets_is_adopted ON pets(is_adopted);
    `);
  }

  public close(): void {
    this.db.close();
  }

  private requirePet(id: number): Pet {
    const pet = this.getPet(id);
    if (!pet) {
      throw new AppError(404, 'pet_not_found', `Pet with ID ${id} not found`);
    }
    return pet;
  }

  private insertPet(input: PetInput): Pet {
    const now = new Date().toISOString();
    const result = this.db
      .prepare(
        `INSERT INTO pets (name, species, breed, age, description, is_adopted, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 0, ?, ?)`
      )
      .run(input.name, input.species, input.breed ?? null, input.age ?? null, input.description ?? null, now, now);

    return this.requirePet(Number(result.lastInsertRowid));
  }

  public listPets(): Pet[] {
    return this.db.prepare<[], PetRow>(`SELECT ${PET_COLUMNS} FROM pets ${NEWEST_FIRST}`).all().map(mapPetRow);
  }

  public getPet(id: number): Pet | null {
    const row = this.db.prepare<[number], PetRow>(`SELECT ${PET_COLUMNS} FROM pets WHERE id = ?`).get(id);
    return row ? mapPetRow(row) : null;
  }

  // Case-insensitive substring match; the newest matching pet wins.
  public findPetByName(fragment: string): Pet | null {
    const trimmed = fragment.trim();
    if (trimmed.length === 0) {
      throw new AppError(400, 'validation_error', 'Pet name to search for cannot be empty.');
    }

    const row = this.db
      .prepare<[string], PetRow>(`SELECT ${PET_COLUMNS} FROM pets WHERE name LIKE ? ESCAPE '\\' ${NEWEST_FIRST} LIMIT 1`)
      .get(`%${escapeLike(trimmed)}%`);
    return row ? mapPetRow(row) : null;
  }

  public createPet(input: PetInput): Pet {
    return this.insertPet(parsePetInput(input));
  }

  // All entries are validated before the transaction starts, so a single bad entry inserts nothing.
  public createPetsBatch(inputs: readonly unknown[]): Pet[] {
    const errors: string[] = [];
    const normalized: PetInput[] = [];

    inputs.forEach((input, index) => {
      const parsed = petInputSchema.safeParse(input);
      if (parsed.success) {
        normalized.push(parsed.data);
      } else {
        errors.push(`Pet ${index + 1}: ${describeFirstIssue(parsed.error)}`);
      }
    });

    if (errors.length > 0) {
      throw new AppError(400, 'validation_error', `Batch rejected: ${errors.length} invalid pet(s).`, { errors });
    }

    const insertAll = this.db.transaction((entries: PetInput[]) => entries.map((entry) => this.insertPet(entry)));
    return insertAll(normalized);
  }

  public updatePet(id: number, patch: PetPatch): Pet {
    const fields = parsePetPatch(patch);
    this.requirePet(id);

    const assignments: string[] = [];
    const values: Array<string | number | null> = [];
    for (const column of ['name', 'species', 'breed', 'age', 'description'] as const) {
      const value = fields[column];
      if (value !== undefined) {
        assignments.push(`${column} = ?`);
        values.push(value);
      }
    }

    if (assignments.length === 0) {
      return this.requirePet(id);
    }

    assignments.push('updated_at = ?');
    values.push(new Date().toISOString(), id);
    this.db.prepare(`UPDATE pets SET ${assignments.join(', ')} WHERE id = ?`).run(...values);

    return this.requirePet(id);
  }

  // Adoption is one-way; there is no operation that clears is_adopted.
  public adoptPet(id: number): Pet {
    const pet = this.requirePet(id);
    if (pet.is_adopted) {
      throw new AppError(409, 'pet_already_adopted', `${pet.name} is already adopted`);
    }

    this.db.prepare('UPDATE pets SET is_adopted = 1, updated_at = ? WHERE id = ?').run(new Date().toISOString(), id);
    return this.requirePet(id);
  }

  public deletePet(idOrName: number | string): boolean {
    let id: number;
    if (typeof idOrName === 'number') {
      id = idOrName;
    } else {
      const pet = this.findPetByName(idOrName);
      if (!pet) {
        return false;
      }
      id = pet.id;
    }

    return this.db.prepare('DELETE FROM pets WHERE id = ?').run(id).changes > 0;
  }

  public searchPets(filters: PetSearchFilters): Pet[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filters.species) {
      conditions.push("species LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLike(filters.species.trim())}%`);
    }
    if (filters.breed) {
      conditions.push("breed LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLike(filters.breed.trim())}%`);
    }
    if (filters.availableOnly) {
      conditions.push('is_adopted = 0');
    }
    if (filters.minAge !== undefined) {
      conditions.push('age >= ?');
      params.push(filters.minAge);
    }
    if (filters.maxAge !== undefined) {
      conditions.push('age <= ?');
      params.push(filters.maxAge);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.db
      .prepare<Array<string | number>, PetRow>(`SELECT ${PET_COLUMNS} FROM pets ${where} ${NEWEST_FIRST}`)
      .all(...params)
      .map(mapPetRow);
  }

  public listAvailablePets(): Pet[] {
    return this.searchPets({ availableOnly: true });
  }

  private countBySpecies(): Record<string, AdoptionCounts> {
    const rows = this.db
      .prepare<[], SpeciesCountRow>(
        `SELECT species, COUNT(*) AS total, COALESCE(SUM(is_adopted), 0) AS adopted
         FROM pets GROUP BY species ORDER BY species`
      )
      .all();

    const counts: Record<string, AdoptionCounts> = {};
    for (const row of rows) {
      counts[row.species] = {
        total: row.total,
        adopted: row.adopted,
        available: row.total - row.adopted
      };
    }
    return counts;
  }

  public getSummary(): PetsSummary {
    const speciesStats = this.countBySpecies();
    let total = 0;
    let adopted = 0;
    for (const counts of Object.values(speciesStats)) {
      total += counts.total;
      adopted += counts.adopted;
    }

    return {
      species_stats: speciesStats,
      overall_totals: {
        total_pets: total,
        adopted_pets: adopted,
        available_pets: total - adopted,
        adoption_rate: adoptionRate(adopted, total)
      }
    };
  }

  public getAdoptionStats(): AdoptionStats {
    const summary = this.getSummary();
    return {
      ...summary.overall_totals,
      species_breakdown: summary.species_stats
    };
  }

  public listValidSpecies(): ValidSpecies {
    const existing = this.db
      .prepare<[], { species: string }>('SELECT DISTINCT species FROM pets ORDER BY species')
      .all()
      .map((row) => row.species);
    const commonOptions: string[] = [...COMMON_SPECIES];

    return {
      species: [...new Set([...existing, ...commonOptions])].sort(),
      existing_in_database: existing,
      common_options: commonOptions
    };
  }
}
