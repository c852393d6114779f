// This module exposes the static MCP resource documents served through resources/list and resources/read.

import type { McpResource, McpResourceContents } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

interface ResourceDefinition extends McpResource {
  readonly render: () => string;
}

const ADOPTION_FORM = [
  '# Pet Adoption Application Form',
  '',
  'This is a sample adoption form that would contain:',
  '- Applicant personal information',
  '- Housing situation details',
  '- Pet care experience',
  '- References and veterinarian information',
  '- Agreement to adoption terms'
].join('\n');

const PET_CARE_GUIDE = [
  '# Pet Care Guidelines',
  '',
  '## General Care Requirements',
  '- Daily feeding schedule',
  '- Regular exercise and mental stimulation',
  '- Routine veterinary care',
  '- Grooming and hygiene maintenance',
  '',
  '## Species-Specific Care',
  'Different species have unique care requirements. Consult with veterinarians for specific guidance.'
].join('\n');

const ADOPTION_PROCESS = [
  '# Pet Adoption Process',
  '',
  '## Step 1: Browse Available Pets',
  'Use our search features to find pets that match your preferences.',
  '',
  '## Step 2: Submit Application',
  'Complete the adoption application form.',
  '',
  '## Step 3: Meet and Greet',
  'Schedule a meeting with your potential new companion.',
  '',
  '## Step 4: Home Visit',
  'Our team will conduct a home visit to ensure suitability.',
  '',
  '## Step 5: Adoption Finalization',
  'Complete paperwork and welcome your new family member!'
].join('\n');

const SPECIES_INFO = {
  species_info: {
    Dog: { lifespan: '12-15 years', exercise: 'high', social: 'very social' },
    Cat: { lifespan: '13-17 years', exercise: 'moderate', social: 'independent' },
    Bird: { lifespan: '5-80 years', exercise: 'moderate', social: 'varies' },
    Rabbit: { lifespan: '8-12 years', exercise: 'high', social: 'social' }
  }
};

// The form keeps its .pdf uri but is served as a markdown outline, so its mimeType is text/markdown.
const RESOURCE_DEFINITIONS: readonly ResourceDefinition[] = [
  {
    uri: 'file://adoption-form.pdf',
    name: 'Pet Adoption Application Form',
    description: 'Standard form for pet adoption applications',
    mimeType: 'text/markdown',
    render: () => ADOPTION_FORM
  },
  {
    uri: 'file://pet-care-guide.md',
    name: 'Pet Care Guidelines',
    description: 'Comprehensive guide for pet care and responsibilities',
    mimeType: 'text/markdown',
    render: () => PET_CARE_GUIDE
  },
  {
    uri: 'file://adoption-process.md',
    name: 'Adoption Process Documentation',
    description: 'Step-by-step guide to the pet adoption process',
    mimeType: 'text/markdown',
    render: () => ADOPTION_PROCESS
  },
  {
    uri: 'file://species-info.json',
    name: 'Pet Species Information',
    description: 'Detailed information about different pet species and their care requirements',
    mimeType: 'application/json',
    render: () => JSON.stringify(SPECIES_INFO, null, 2)
  }
];

let cachedResourceList: readonly McpResource[] | null = null;

export function listResources(): readonly McpResource[] {
  if (!cachedResourceList) {
    cachedResourceList = Object.freeze(
      RESOURCE_DEFINITIONS.map((definition) => ({
        uri: definition.uri,
        name: definition.name,
        description: definition.description,
        mimeType: definition.mimeType
      }))
    );
  }

  return cachedResourceList;
}

export function readResource(uri: string): { contents: McpResourceContents[] } {
  const definition = RESOURCE_DEFINITIONS.find((candidate) => candidate.uri === uri);
  if (!definition) {
    throw new AppError(404, 'resource_not_found', `Resource not found: ${uri}`);
  }

  return {
    contents: [
      {
        uri: definition.uri,
        mimeType: definition.mimeType,
        text: definition.render()
      }
    ]
  };
}
