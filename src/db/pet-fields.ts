// This module validates and normalizes pet fields before they reach SQLite or leave the REST layer.

import { z } from 'zod';
import type { PetInput, PetPatch } from '../types/domain.js';
import { AppError, describeFirstIssue } from '../utils/errors.js';

export const PET_NAME_MAX = 100;
export const PET_SPECIES_MAX = 50;
export const PET_BREED_MAX = 100;
export const PET_AGE_MAX = 50;
export const PET_DESCRIPTION_MAX = 1000;

// Uppercases the first letter of every word and lowercases the rest, so "guinea PIG" becomes "Guinea Pig".
export function toTitleCase(value: string): string {
  return value
    .toLocaleLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => `${prefix}${letter.toLocaleUpperCase()}`);
}

const nameSchema = z.string().trim().min(1, 'Name cannot be empty or whitespace only').max(PET_NAME_MAX);
const speciesSchema = z.string().trim().min(1, 'Species cannot be empty').max(PET_SPECIES_MAX).transform(toTitleCase);
const breedSchema = z
  .string()
  .trim()
  .max(PET_BREED_MAX)
  .transform((value) => (value.length === 0 ? null : toTitleCase(value)))
  .nullable();
const ageSchema = z.number().int().min(0).max(PET_AGE_MAX).nullable();
const descriptionSchema = z
  .string()
  .trim()
  .max(PET_DESCRIPTION_MAX)
  .transform((value) => (value.length === 0 ? null : value))
  .nullable();

export const petInputSchema = z.object({
  name: nameSchema,
  species: speciesSchema,
  breed: breedSchema.optional(),
  age: ageSchema.optional(),
  description: descriptionSchema.optional()
});

export const petPatchSchema = z.object({
  name: nameSchema.optional(),
  species: speciesSchema.optional(),
  breed: breedSchema.optional(),
  age: ageSchema.optional(),
  description: descriptionSchema.optional()
});

// This helper parses one create payload and reports the first offending field as a validation_error.
export function parsePetInput(value: unknown): PetInput {
  const parsed = petInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', describeFirstIssue(parsed.error), parsed.error.flatten());
  }

  return parsed.data;
}

// This helper parses one partial update payload with the same field rules as creation.
export function parsePetPatch(value: unknown): PetPatch {
  const parsed = petPatchSchema.safeParse(value);
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', describeFirstIssue(parsed.error), parsed.error.flatten());
  }

  return parsed.data;
}
