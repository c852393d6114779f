// This module defines the static MCP tool catalog: zod input and output contracts plus descriptor metadata.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { COMMON_SPECIES } from '../types/domain.js';
import type { McpTool, McpToolAnnotations } from '../types/mcp.js';

const petIdSchema = z.number().int().min(1);
const petNameFragmentSchema = z.string().trim().min(1);
const speciesEnumSchema = z.enum(COMMON_SPECIES);

// Tool-facing limits are tighter than the store's so agents stay within typical shelter data.
const TOOL_AGE_MAX = 30;
const TOOL_DESCRIPTION_MAX = 500;

export const listAllPetsSchema = z.object({}).strict();

export const getPetByIdSchema = z
  .object({
    pet_id: petIdSchema.describe('Pet ID to retrieve')
  })
  .strict();

export const getPetByNameSchema = z
  .object({
    pet_name: petNameFragmentSchema.describe('Pet name or part of it; matching is case-insensitive')
  })
  .strict();

export const createPetSchema = z
  .object({
    name: z.string().trim().min(1).max(100).describe('Pet name'),
    species: speciesEnumSchema.describe('Pet species'),
    breed: z.string().max(100).optional().describe('Pet breed'),
    age: z.number().int().min(0).max(TOOL_AGE_MAX).optional().describe('Pet age in years'),
    description: z.string().max(TOOL_DESCRIPTION_MAX).optional().describe('Pet description')
  })
  .strict();

export const updatePetInfoSchema = z
  .object({
    pet_id: petIdSchema.describe('Pet ID to update'),
    name: z.string().trim().min(1).max(100).optional().describe('New pet name'),
    species: speciesEnumSchema.optional().describe('New pet species'),
    breed: z.string().max(100).optional().describe('New pet breed'),
    age: z.number().int().min(0).max(TOOL_AGE_MAX).optional().describe('New pet age'),
    description: z.string().max(TOOL_DESCRIPTION_MAX).optional().describe('New pet description')
  })
  .strict();

export const deletePetSchema = z
  .object({
    pet_id: petIdSchema.optional().describe('Pet ID to delete'),
    pet_name: petNameFragmentSchema.optional().describe('Pet name to delete (alternative to pet_id)')
  })
  .strict()
  .refine((value) => value.pet_id !== undefined || value.pet_name !== undefined, {
    message: 'Either pet_id or pet_name must be provided'
  });

export const adoptPetByNameSchema = z
  .object({
    pet_name: petNameFragmentSchema.describe('Pet name to search for and adopt')
  })
  .strict();

export const searchPetsSchema = z
  .object({
    species: z.string().trim().min(1).optional().describe('Filter by species (substring, case-insensitive)'),
    breed: z.string().trim().min(1).optional().describe('Filter by breed (substring, case-insensitive)'),
    available_only: z.boolean().default(false).describe('Only pets that are not adopted yet'),
    min_age: z.number().int().min(0).optional().describe('Minimum age'),
    max_age: z.number().int().min(0).optional().describe('Maximum age')
  })
  .strict();

export const getAvailablePetsSchema = z.object({}).strict();
export const getPetsSummarySchema = z.object({}).strict();
export const getValidSpeciesSchema = z.object({}).strict();
export const getAdoptionStatsSchema = z.object({}).strict();

export const petOutputSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  species: z.string(),
  breed: z.string().nullable(),
  age: z.number().int().nullable(),
  description: z.string().nullable(),
  is_adopted: z.boolean(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime()
});

export const petListOutputSchema = z.object({
  pets: z.array(petOutputSchema),
  total_count: z.number().int()
});

export const adoptionOutputSchema = z.object({
  message: z.string(),
  pet: petOutputSchema
});

export const deleteOutputSchema = z.object({
  message: z.string(),
  deleted_pet_id: z.number().int()
});

const adoptionCountsSchema = z.object({
  total: z.number().int(),
  adopted: z.number().int(),
  available: z.number().int()
});

export const petsSummaryOutputSchema = z.object({
  summary_by_species: z.record(adoptionCountsSchema).describe('Statistics grouped by pet species'),
  overall_totals: z.object({
    total_pets: z.number().int(),
    adopted_pets: z.number().int(),
    available_pets: z.number().int(),
    adoption_rate: z.number()
  })
});

export const validSpeciesOutputSchema = z.object({
  species: z.array(z.string()).describe('All valid pet species'),
  existing_in_database: z.array(z.string()).describe('Species currently in the catalog'),
  common_options: z.array(z.string()).describe('Common pet species options')
});

export const adoptionStatsOutputSchema = z.object({
  total_pets: z.number().int(),
  adopted_pets: z.number().int(),
  available_pets: z.number().int(),
  adoption_rate: z.number().describe('Adopted share in percent, two decimals'),
  species_breakdown: z.record(adoptionCountsSchema)
});

export type PetPayload = z.infer<typeof petOutputSchema>;
export type PetListPayload = z.infer<typeof petListOutputSchema>;

export type ToolName =
  | 'list_all_pets'
  | 'get_pet_by_id'
  | 'get_pet_by_name'
  | 'create_pet'
  | 'update_pet_info'
  | 'delete_pet'
  | 'adopt_pet_by_name'
  | 'search_pets'
  | 'get_available_pets'
  | 'get_pets_summary'
  | 'get_valid_species'
  | 'get_adoption_stats';

export interface ToolDefinition {
  readonly name: ToolName;
  readonly title: string;
  readonly description: string;
  readonly input: z.ZodTypeAny;
  readonly output: z.ZodTypeAny;
  readonly annotations: McpToolAnnotations;
}

const readAnnotations = (priority: number, category: McpToolAnnotations['category']): McpToolAnnotations => ({
  audience: ['user', 'assistant'],
  priority,
  category,
  requiresConfirmation: false
});

const writeAnnotations = (priority: number, destructive = false): McpToolAnnotations => ({
  audience: ['user', 'assistant'],
  priority,
  category: 'modification',
  requiresConfirmation: true,
  sensitiveOperation: true,
  ...(destructive ? { destructiveOperation: true } : {})
});

// Order here is the order clients see in tools/list.
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'list_all_pets',
    title: 'List All Pets',
    description: 'Get a complete list of all pets in the system.',
    input: listAllPetsSchema,
    output: petListOutputSchema,
    annotations: readAnnotations(0.7, 'search')
  },
  {
    name: 'get_pet_by_id',
    title: 'Get Pet by ID',
    description: 'Get a specific pet by its ID.',
    input: getPetByIdSchema,
    output: petOutputSchema,
    annotations: readAnnotations(0.8, 'search')
  },
  {
    name: 'get_pet_by_name',
    title: 'Get Pet by Name',
    description: 'Find a pet whose name contains the given text (case-insensitive); returns the newest match.',
    input: getPetByNameSchema,
    output: petOutputSchema,
    annotations: readAnnotations(0.8, 'search')
  },
  {
    name: 'create_pet',
    title: 'Create Pet',
    description: 'Add a new pet to the adoption system.',
    input: createPetSchema,
    output: petOutputSchema,
    annotations: writeAnnotations(0.7)
  },
  {
    name: 'update_pet_info',
    title: 'Update Pet Information',
    description: 'Update pet details like name, species, breed, age, or description.',
    input: updatePetInfoSchema,
    output: petOutputSchema,
    annotations: writeAnnotations(0.7)
  },
  {
    name: 'delete_pet',
    title: 'Delete Pet',
    description: 'Remove a pet from the system by ID or name.',
    input: deletePetSchema,
    output: deleteOutputSchema,
    annotations: writeAnnotations(0.6, true)
  },
  {
    name: 'adopt_pet_by_name',
    title: 'Adopt Pet by Name',
    description: 'Mark a pet as adopted by searching for its name.',
    input: adoptPetByNameSchema,
    output: adoptionOutputSchema,
    annotations: writeAnnotations(0.8)
  },
  {
    name: 'search_pets',
    title: 'Search Pets',
    description: 'Search pets with optional filters for species, breed, availability, and age.',
    input: searchPetsSchema,
    output: petListOutputSchema,
    annotations: readAnnotations(0.8, 'search')
  },
  {
    name: 'get_available_pets',
    title: 'Get Available Pets',
    description: 'Get all pets that are currently available for adoption.',
    input: getAvailablePetsSchema,
    output: petListOutputSchema,
    annotations: readAnnotations(0.9, 'search')
  },
  {
    name: 'get_pets_summary',
    title: 'Get Pets Summary',
    description: 'Get pet statistics by species and adoption status.',
    input: getPetsSummarySchema,
    output: petsSummaryOutputSchema,
    annotations: readAnnotations(0.9, 'analytics')
  },
  {
    name: 'get_valid_species',
    title: 'Get Valid Pet Species',
    description: 'Get the list of valid pet species including existing and common options.',
    input: getValidSpeciesSchema,
    output: validSpeciesOutputSchema,
    annotations: readAnnotations(0.6, 'reference')
  },
  {
    name: 'get_adoption_stats',
    title: 'Get Adoption Statistics',
    description: 'Get overall adoption statistics including rates and counts.',
    input: getAdoptionStatsSchema,
    output: adoptionStatsOutputSchema,
    annotations: readAnnotations(0.8, 'analytics')
  }
];

const TOOL_DEFINITION_BY_NAME: ReadonlyMap<string, ToolDefinition> = new Map(
  TOOL_DEFINITIONS.map((definition) => [definition.name, definition])
);

export function findToolDefinition(name: string): ToolDefinition | null {
  return TOOL_DEFINITION_BY_NAME.get(name) ?? null;
}

function toJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  return zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' }) as Record<string, unknown>;
}

let cachedToolList: readonly McpTool[] | null = null;

// The catalog is derived once; every tools/list call serializes the same frozen array.
export function buildToolList(): readonly McpTool[] {
  if (!cachedToolList) {
    cachedToolList = Object.freeze(
      TOOL_DEFINITIONS.map((definition) => ({
        name: definition.name,
        title: definition.title,
        description: definition.description,
        inputSchema: toJsonSchema(definition.input),
        outputSchema: toJsonSchema(definition.output),
        annotations: definition.annotations
      }))
    );
  }

  return cachedToolList;
}
