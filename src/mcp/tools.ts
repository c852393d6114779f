// This module implements the MCP tool invocation pipeline: lookup, argument validation, store dispatch, and result shaping.

import type { FastifyBaseLogger } from 'fastify';
import { ZodError } from 'zod';
import type { Pet, PetStore } from '../types/domain.js';
import type { McpToolCallResult } from '../types/mcp.js';
import { AppError, describeFirstIssue } from '../utils/errors.js';
import { errorForLog, shapeForLog } from '../utils/logger.js';
import {
  adoptPetByNameSchema,
  createPetSchema,
  deletePetSchema,
  findToolDefinition,
  getAdoptionStatsSchema,
  getAvailablePetsSchema,
  getPetByIdSchema,
  getPetByNameSchema,
  getPetsSummarySchema,
  getValidSpeciesSchema,
  listAllPetsSchema,
  searchPetsSchema,
  updatePetInfoSchema,
  type PetListPayload,
  type PetPayload,
  type ToolName
} from './tool-schemas.js';

export interface ToolRuntimeContext {
  store: PetStore;
  logger: FastifyBaseLogger;
}

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Record<string, unknown>;

// Successful calls carry the payload twice: as JSON text for plain clients and as structuredContent for schema-aware ones.
function toolResult(payload: Record<string, unknown>): McpToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: false,
    structuredContent: payload
  };
}

// Tool failures travel inside a successful JSON-RPC result; only isError tells the client something went wrong.
function toolError(message: string): McpToolCallResult {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true
  };
}

function toPetPayload(pet: Pet): PetPayload {
  return {
    id: pet.id,
    name: pet.name,
    species: pet.species,
    breed: pet.breed,
    age: pet.age,
    description: pet.description,
    is_adopted: pet.is_adopted,
    created_at: pet.created_at,
    updated_at: pet.updated_at
  };
}

function toPetListPayload(pets: Pet[]): PetListPayload {
  return {
    pets: pets.map(toPetPayload),
    total_count: pets.length
  };
}

function requirePetByName(store: PetStore, fragment: string): Pet {
  const pet = store.findPetByName(fragment);
  if (!pet) {
    throw new AppError(404, 'pet_not_found', `No pet found with name containing "${fragment}"`);
  }
  return pet;
}

function summarizeToolOutput(payload: Record<string, unknown>): Record<string, unknown> {
  if ('total_count' in payload) {
    return { total_count: payload.total_count };
  }

  if ('id' in payload) {
    return { id: payload.id };
  }

  return { keys: Object.keys(payload) };
}

function handleListAllPets(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  listAllPetsSchema.parse(args);
  return toPetListPayload(context.store.listPets());
}

function handleGetPetById(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = getPetByIdSchema.parse(args);
  const pet = context.store.getPet(input.pet_id);
  if (!pet) {
    throw new AppError(404, 'pet_not_found', `Pet with ID ${input.pet_id} not found`);
  }
  return toPetPayload(pet);
}

function handleGetPetByName(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = getPetByNameSchema.parse(args);
  return toPetPayload(requirePetByName(context.store, input.pet_name));
}

function handleCreatePet(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = createPetSchema.parse(args);
  const pet = context.store.createPet({
    name: input.name,
    species: input.species,
    breed: input.breed,
    age: input.age,
    description: input.description
  });
  return toPetPayload(pet);
}

function handleUpdatePetInfo(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const { pet_id: petId, ...patch } = updatePetInfoSchema.parse(args);
  return toPetPayload(context.store.updatePet(petId, patch));
}

// pet_id wins when both selectors are supplied.
function handleDeletePet(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = deletePetSchema.parse(args);

  let petId: number;
  if (input.pet_id !== undefined) {
    petId = input.pet_id;
  } else {
    const name = input.pet_name ?? '';
    const pet = context.store.findPetByName(name);
    if (!pet) {
      throw new AppError(404, 'pet_not_found', `Pet with name '${name}' not found`);
    }
    petId = pet.id;
  }

  if (!context.store.deletePet(petId)) {
    throw new AppError(404, 'pet_not_found', `Pet with ID ${petId} not found`);
  }

  return {
    message: `Pet with ID ${petId} has been successfully deleted`,
    deleted_pet_id: petId
  };
}

function handleAdoptPetByName(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = adoptPetByNameSchema.parse(args);
  const pet = requirePetByName(context.store, input.pet_name);
  const adopted = context.store.adoptPet(pet.id);

  return {
    message: `${adopted.name} has been successfully adopted!`,
    pet: toPetPayload(adopted)
  };
}

function handleSearchPets(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  const input = searchPetsSchema.parse(args);
  const pets = context.store.searchPets({
    species: input.species,
    breed: input.breed,
    availableOnly: input.available_only,
    minAge: input.min_age,
    maxAge: input.max_age
  });
  return toPetListPayload(pets);
}

function handleGetAvailablePets(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  getAvailablePetsSchema.parse(args);
  return toPetListPayload(context.store.listAvailablePets());
}

function handleGetPetsSummary(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  getPetsSummarySchema.parse(args);
  const summary = context.store.getSummary();
  return {
    summary_by_species: summary.species_stats,
    overall_totals: summary.overall_totals
  };
}

function handleGetValidSpecies(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  getValidSpeciesSchema.parse(args);
  const valid = context.store.listValidSpecies();
  return {
    species: valid.species,
    existing_in_database: valid.existing_in_database,
    common_options: valid.common_options
  };
}

function handleGetAdoptionStats(args: unknown, context: ToolRuntimeContext): Record<string, unknown> {
  getAdoptionStatsSchema.parse(args);
  const stats = context.store.getAdoptionStats();
  return {
    total_pets: stats.total_pets,
    adopted_pets: stats.adopted_pets,
    available_pets: stats.available_pets,
    adoption_rate: stats.adoption_rate,
    species_breakdown: stats.species_breakdown
  };
}

export const TOOL_HANDLERS: Readonly<Record<ToolName, ToolHandler>> = {
  list_all_pets: handleListAllPets,
  get_pet_by_id: handleGetPetById,
  get_pet_by_name: handleGetPetByName,
  create_pet: handleCreatePet,
  update_pet_info: handleUpdatePetInfo,
  delete_pet: handleDeletePet,
  adopt_pet_by_name: handleAdoptPetByName,
  search_pets: handleSearchPets,
  get_available_pets: handleGetAvailablePets,
  get_pets_summary: handleGetPetsSummary,
  get_valid_species: handleGetValidSpecies,
  get_adoption_stats: handleGetAdoptionStats
};

// This function never rejects: unknown tools, invalid arguments, domain failures, and internal faults all become isError results.
export async function executeTool(
  toolName: string,
  args: unknown,
  context: ToolRuntimeContext
): Promise<McpToolCallResult> {
  const startedAt = Date.now();
  const normalizedArgs = args ?? {};

  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName,
      args: shapeForLog(normalizedArgs)
    },
    'mcp_tool_execution_started'
  );

  const definition = findToolDefinition(toolName);
  if (!definition) {
    context.logger.warn({ event: 'mcp_tool_not_found', toolName }, 'mcp_tool_not_found');
    return toolError(`Unknown tool: ${toolName}`);
  }

  try {
    const payload = TOOL_HANDLERS[definition.name](normalizedArgs, context);

    context.logger.info(
      {
        event: 'mcp_tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        result: summarizeToolOutput(payload)
      },
      'mcp_tool_execution_completed'
    );

    return toolResult(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      const message = describeFirstIssue(error);
      context.logger.warn(
        {
          event: 'mcp_tool_arguments_invalid',
          toolName,
          issues: shapeForLog(error.flatten())
        },
        'mcp_tool_arguments_invalid'
      );
      return toolError(message);
    }

    if (error instanceof AppError) {
      context.logger.warn(
        {
          event: 'mcp_tool_domain_error',
          toolName,
          code: error.code,
          message: error.message,
          durationMs: Date.now() - startedAt
        },
        'mcp_tool_domain_error'
      );
      return toolError(error.message);
    }

    context.logger.error(
      {
        event: 'mcp_tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    const reason = error instanceof Error ? error.message : String(error);
    return toolError(`Internal error while executing ${toolName}: ${reason}`);
  }
}
