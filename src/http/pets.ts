// This module exposes the REST CRUD surface for the pet catalog under /api/v1/pets.

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parsePetInput, parsePetPatch, PET_AGE_MAX } from '../db/pet-fields.js';
import type { Pet, PetStore } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export const PETS_ROUTE_PREFIX = '/api/v1/pets';

const BATCH_MAX = 50;

const petIdParamsSchema = z.object({
  id: z.coerce.number().int().min(1)
});

const queryFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const searchQuerySchema = z.object({
  species: z.string().trim().min(1).optional(),
  breed: z.string().trim().min(1).optional(),
  available_only: queryFlagSchema.default('false'),
  min_age: z.coerce.number().int().min(0).max(PET_AGE_MAX).optional(),
  max_age: z.coerce.number().int().min(0).max(PET_AGE_MAX).optional()
});

const adoptByNameQuerySchema = z.object({
  name: z.string().trim().min(1, 'Pet name to search for cannot be empty.')
});

const batchBodySchema = z.object({
  pets: z.array(z.unknown()).min(1).max(BATCH_MAX)
});

function listResponse(pets: Pet[]): { ok: true; pets: Pet[]; total_count: number } {
  return {
    ok: true,
    pets,
    total_count: pets.length
  };
}

function requirePet(store: PetStore, id: number): Pet {
  const pet = store.getPet(id);
  if (!pet) {
    throw new AppError(404, 'pet_not_found', `Pet with ID ${id} not found`);
  }
  return pet;
}

// Validation failures are thrown as ZodError or AppError and rendered by the server-wide error handler.
export function registerPetRoutes(fastify: FastifyInstance, store: PetStore): void {
  fastify.get(PETS_ROUTE_PREFIX, async () => listResponse(store.listPets()));

  fastify.post(PETS_ROUTE_PREFIX, async (request, reply) => {
    const pet = store.createPet(parsePetInput(request.body));

    request.log.info({ event: 'pet_created', petId: pet.id, species: pet.species }, 'pet_created');
    reply.code(201).send({ ok: true, pet });
  });

  fastify.get(`${PETS_ROUTE_PREFIX}/summary`, async () => ({
    ok: true,
    ...store.getSummary()
  }));

  fastify.get(`${PETS_ROUTE_PREFIX}/species`, async () => ({
    ok: true,
    ...store.listValidSpecies()
  }));

  fastify.get(`${PETS_ROUTE_PREFIX}/available`, async () => listResponse(store.listAvailablePets()));

  fastify.get(`${PETS_ROUTE_PREFIX}/search`, async (request) => {
    const query = searchQuerySchema.parse(request.query);

    return listResponse(
      store.searchPets({
        species: query.species,
        breed: query.breed,
        availableOnly: query.available_only,
        minAge: query.min_age,
        maxAge: query.max_age
      })
    );
  });

  fastify.post(`${PETS_ROUTE_PREFIX}/batch`, async (request, reply) => {
    const body = batchBodySchema.parse(request.body);
    const created = store.createPetsBatch(body.pets);

    request.log.info({ event: 'pets_batch_created', count: created.length }, 'pets_batch_created');
    reply.code(201).send({
      ok: true,
      created_pets: created,
      total_created: created.length
    });
  });

  fastify.put(`${PETS_ROUTE_PREFIX}/adopt`, async (request) => {
    const query = adoptByNameQuerySchema.parse(request.query);
    const match = store.findPetByName(query.name);
    if (!match) {
      throw new AppError(404, 'pet_not_found', `No pet found with name containing "${query.name}"`);
    }

    const pet = store.adoptPet(match.id);
    request.log.info({ event: 'pet_adopted', petId: pet.id }, 'pet_adopted');

    return {
      ok: true,
      message: `${pet.name} has been successfully adopted!`,
      pet
    };
  });

  fastify.get(`${PETS_ROUTE_PREFIX}/:id`, async (request) => {
    const { id } = petIdParamsSchema.parse(request.params);
    return { ok: true, pet: requirePet(store, id) };
  });

  fastify.put(`${PETS_ROUTE_PREFIX}/:id`, async (request) => {
    const { id } = petIdParamsSchema.parse(request.params);
    const pet = store.updatePet(id, parsePetPatch(request.body ?? {}));

    request.log.info({ event: 'pet_updated', petId: pet.id }, 'pet_updated');
    return { ok: true, pet };
  });

  fastify.delete(`${PETS_ROUTE_PREFIX}/:id`, async (request, reply) => {
    const { id } = petIdParamsSchema.parse(request.params);
    if (!store.deletePet(id)) {
      throw new AppError(404, 'pet_not_found', `Pet with ID ${id} not found`);
    }

    request.log.info({ event: 'pet_deleted', petId: id }, 'pet_deleted');
    reply.code(204).send();
  });

  fastify.put(`${PETS_ROUTE_PREFIX}/:id/adopt`, async (request) => {
    const { id } = petIdParamsSchema.parse(request.params);
    const pet = store.adoptPet(id);

    request.log.info({ event: 'pet_adopted', petId: pet.id }, 'pet_adopted');
    return {
      ok: true,
      message: `${pet.name} has been successfully adopted!`,
      pet
    };
  });
}
