// This module defines the MCP prompt templates and renders them into role-tagged messages.

import type { McpPrompt, McpPromptMessage } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

type PromptArgs = Readonly<Record<string, string | undefined>>;

interface PromptDefinition extends McpPrompt {
  readonly render: (args: PromptArgs) => McpPromptMessage[];
}

function message(role: McpPromptMessage['role'], text: string): McpPromptMessage {
  return { role, content: { type: 'text', text } };
}

function renderAdoptionAssistant(args: PromptArgs): McpPromptMessage[] {
  const petType = args.pet_type ?? 'any pet';
  const experience = args.experience_level ?? 'beginner';

  return [
    message(
      'system',
      `You are a knowledgeable and compassionate pet adoption counselor. Help the user find the perfect ${petType} companion based on their ${experience} experience level. Provide personalized advice about pet care, responsibilities, and what to expect during the adoption process.`
    ),
    message(
      'user',
      `I'm interested in adopting ${petType} and I consider myself a ${experience} pet owner. Can you help guide me through the adoption process and what I should consider?`
    )
  ];
}

function renderPetCareAdvisor(args: PromptArgs): McpPromptMessage[] {
  const species = args.species ?? 'pet';
  const ageInfo = args.age ? ` that is ${args.age} years old` : '';
  const specialInfo = args.special_needs ? ` with special needs: ${args.special_needs}` : '';
  const subject = `${species}${ageInfo}${specialInfo}`;

  return [
    message(
      'system',
      `You are an expert veterinarian and pet care specialist. Provide detailed, practical advice for caring for a ${subject}. Include information about feeding, exercise, health care, grooming, and any species-specific needs.`
    ),
    message(
      'user',
      `I just adopted a ${subject}. What specific care advice do you have for me to ensure my new pet is healthy and happy?`
    )
  ];
}

function renderSpeciesRecommender(args: PromptArgs): McpPromptMessage[] {
  const livingSituation = args.living_situation ?? 'not specified';
  const timeAvailable = args.time_available ?? 'moderate';
  const experience = args.experience ?? 'some';

  return [
    message(
      'system',
      'You are a pet adoption specialist who helps match people with the most suitable pet species based on their lifestyle, living situation, and experience. Consider factors like space requirements, time commitment, maintenance needs, and compatibility.'
    ),
    message(
      'user',
      `I live in a ${livingSituation} and have ${timeAvailable} time available for pet care. I have ${experience} experience with pets. What species would you recommend for me and why?`
    )
  ];
}

const PROMPT_DEFINITIONS: readonly PromptDefinition[] = [
  {
    name: 'adoption_assistant',
    description: 'AI assistant for pet adoption counseling and guidance',
    arguments: [
      { name: 'pet_type', description: 'Type of pet interested in', required: false },
      { name: 'experience_level', description: 'Pet owner experience level', required: false }
    ],
    render: renderAdoptionAssistant
  },
  {
    name: 'pet_care_advisor',
    description: 'Provide specific care advice for adopted pets',
    arguments: [
      { name: 'species', description: 'Pet species', required: true },
      { name: 'age', description: 'Pet age', required: false },
      { name: 'special_needs', description: 'Any special care requirements', required: false }
    ],
    render: renderPetCareAdvisor
  },
  {
    name: 'species_recommender',
    description: 'Recommend suitable pet species based on lifestyle and preferences',
    arguments: [
      { name: 'living_situation', description: 'Housing situation', required: false },
      { name: 'time_available', description: 'Time available for pet care', required: false },
      { name: 'experience', description: 'Previous pet experience', required: false }
    ],
    render: renderSpeciesRecommender
  }
];

let cachedPromptList: readonly McpPrompt[] | null = null;

export function listPrompts(): readonly McpPrompt[] {
  if (!cachedPromptList) {
    cachedPromptList = Object.freeze(
      PROMPT_DEFINITIONS.map((definition) => ({
        name: definition.name,
        description: definition.description,
        arguments: definition.arguments.map((argument) => ({ ...argument }))
      }))
    );
  }

  return cachedPromptList;
}

// This helper accepts only declared string arguments; empty strings count as absent so defaults apply.
function normalizePromptArgs(definition: PromptDefinition, rawArgs: Record<string, unknown>): PromptArgs {
  const args: Record<string, string | undefined> = {};

  for (const [key, value] of Object.entries(rawArgs)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new AppError(400, 'invalid_params', `Prompt argument "${key}" must be a string.`);
    }
    if (value.trim().length > 0) {
      args[key] = value;
    }
  }

  for (const argument of definition.arguments) {
    if (argument.required && args[argument.name] === undefined) {
      throw new AppError(400, 'invalid_params', `Missing required argument "${argument.name}" for prompt ${definition.name}.`);
    }
  }

  return args;
}

export function getPrompt(
  name: string,
  rawArgs: Record<string, unknown> = {}
): { description: string; messages: McpPromptMessage[] } {
  const definition = PROMPT_DEFINITIONS.find((candidate) => candidate.name === name);
  if (!definition) {
    throw new AppError(404, 'prompt_not_found', `Unknown prompt: ${name}`);
  }

  return {
    description: definition.description,
    messages: definition.render(normalizePromptArgs(definition, rawArgs))
  };
}
