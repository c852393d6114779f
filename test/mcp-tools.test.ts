// This test suite verifies the MCP tool pipeline: dispatch to the store, result shaping, and the isError channel.

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteStore } from '../src/db/database.js';
import { seedSamplePets } from '../src/db/seed.js';
import { findToolDefinition } from '../src/mcp/tool-schemas.js';
import { executeTool, type ToolRuntimeContext } from '../src/mcp/tools.js';
import type { McpToolCallResult } from '../src/types/mcp.js';
import { makeTempDir, openStore, removeTempDir, silentLogger } from './helpers.js';

function errorText(result: McpToolCallResult): string {
  expect(result.isError).toBe(true);
  expect(result.structuredContent).toBeUndefined();
  return result.content[0]?.text ?? '';
}

describe('mcp tool pipeline', () => {
  let dir: string;
  let store: SqliteStore;
  let context: ToolRuntimeContext;

  beforeEach(() => {
    dir = makeTempDir();
    store = openStore(dir);
    seedSamplePets(store);
    context = { store, logger: silentLogger };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    store.close();
    removeTempDir(dir);
  });

  it('returns a pet found by name as text and structured content', async () => {
    const tweety = store.findPetByName('Tweety');
    const result = await executeTool('get_pet_by_name', { pet_name: 'Tweety' }, context);

    expect(result.isError).toBe(false);
    expect(result.structuredContent).toMatchObject({ id: tweety?.id, name: 'Tweety', species: 'Bird' });
    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(result.structuredContent, null, 2) }]);
    expect(result.content[0]?.text).toContain(`"id": ${tweety?.id}`);
  });

  it('reports unknown tools inside the result', async () => {
    const result = await executeTool('fly_pet', {}, context);

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool: fly_pet' }],
      isError: true
    });
  });

  it('stops at argument validation before touching the store', async () => {
    const createSpy = vi.spyOn(store, 'createPet');

    const result = await executeTool('create_pet', { species: 'Dog' }, context);

    expect(errorText(result)).toBe('Error: Invalid argument "name": Required');
    expect(createSpy).not.toHaveBeenCalled();
  });

  it('restricts tool species to the common list', async () => {
    const result = await executeTool('create_pet', { name: 'Smaug', species: 'Dragon' }, context);

    expect(errorText(result).startsWith('Error: Invalid argument "species": Invalid enum value.')).toBe(true);
  });

  it('rejects arguments the schema does not declare', async () => {
    const result = await executeTool('list_all_pets', { foo: 1 }, context);

    expect(errorText(result)).toBe("Error: Invalid arguments: Unrecognized key(s) in object: 'foo'");
  });

  it('treats missing arguments as an empty object', async () => {
    const result = await executeTool('list_all_pets', null, context);

    expect(result.isError).toBe(false);
    expect(result.structuredContent?.total_count).toBe(5);
  });

  it('creates pets and returns the stored record', async () => {
    const result = await executeTool(
      'create_pet',
      { name: 'Nibbles', species: 'Hamster', breed: 'syrian', age: 1 },
      context
    );

    expect(result.isError).toBe(false);
    expect(result.structuredContent).toMatchObject({ name: 'Nibbles', species: 'Hamster', breed: 'Syrian', age: 1 });
    expect(store.findPetByName('Nibbles')).not.toBeNull();
  });

  it('updates only the supplied fields', async () => {
    const max = store.findPetByName('Max');
    const result = await executeTool('update_pet_info', { pet_id: max?.id, age: 5 }, context);

    expect(result.structuredContent).toMatchObject({ name: 'Max', breed: 'Labrador', age: 5 });
  });

  it('adopts by name and refuses a second adoption', async () => {
    const first = await executeTool('adopt_pet_by_name', { pet_name: 'buddy' }, context);

    expect(first.isError).toBe(false);
    expect(first.structuredContent).toMatchObject({
      message: 'Buddy has been successfully adopted!',
      pet: { name: 'Buddy', is_adopted: true }
    });

    const second = await executeTool('adopt_pet_by_name', { pet_name: 'buddy' }, context);
    expect(errorText(second)).toBe('Error: Buddy is already adopted');
  });

  it('deletes by name and by id', async () => {
    const luna = store.findPetByName('Luna');
    const byName = await executeTool('delete_pet', { pet_name: 'Luna' }, context);

    expect(byName.structuredContent).toEqual({
      message: `Pet with ID ${luna?.id} has been successfully deleted`,
      deleted_pet_id: luna?.id
    });

    const byId = await executeTool('delete_pet', { pet_id: luna?.id }, context);
    expect(errorText(byId)).toBe(`Error: Pet with ID ${luna?.id} not found`);
  });

  it('requires a delete selector', async () => {
    const result = await executeTool('delete_pet', {}, context);

    expect(errorText(result)).toBe('Error: Invalid arguments: Either pet_id or pet_name must be provided');
  });

  it('reports domain lookups that miss', async () => {
    expect(errorText(await executeTool('get_pet_by_id', { pet_id: 999 }, context))).toBe('Error: Pet with ID 999 not found');
    expect(errorText(await executeTool('get_pet_by_name', { pet_name: 'Zed' }, context))).toBe(
      'Error: No pet found with name containing "Zed"'
    );
    expect(errorText(await executeTool('delete_pet', { pet_name: 'Ghost' }, context))).toBe(
      "Error: Pet with name 'Ghost' not found"
    );
  });

  it('searches with filters', async () => {
    await executeTool('adopt_pet_by_name', { pet_name: 'Max' }, context);

    const result = await executeTool('search_pets', { species: 'dog', available_only: true }, context);

    expect(result.structuredContent).toMatchObject({ total_count: 1, pets: [{ name: 'Buddy' }] });
  });

  it('computes adoption statistics', async () => {
    await executeTool('adopt_pet_by_name', { pet_name: 'Whiskers' }, context);

    const result = await executeTool('get_adoption_stats', {}, context);

    expect(result.structuredContent).toEqual({
      total_pets: 5,
      adopted_pets: 1,
      available_pets: 4,
      adoption_rate: 20,
      species_breakdown: {
        Bird: { total: 1, adopted: 0, available: 1 },
        Cat: { total: 2, adopted: 1, available: 1 },
        Dog: { total: 2, adopted: 0, available: 2 }
      }
    });
  });

  it('turns unexpected store faults into internal tool errors', async () => {
    vi.spyOn(store, 'listPets').mockImplementation(() => {
      throw new Error('disk gone');
    });

    const result = await executeTool('list_all_pets', {}, context);

    expect(errorText(result)).toBe('Error: Internal error while executing list_all_pets: disk gone');
  });

  it('produces structured content that satisfies each declared output schema', async () => {
    const tweety = store.findPetByName('Tweety');
    const calls: Array<[string, Record<string, unknown>]> = [
      ['list_all_pets', {}],
      ['get_pet_by_id', { pet_id: tweety?.id }],
      ['get_pet_by_name', { pet_name: 'Tweety' }],
      ['create_pet', { name: 'Bubbles', species: 'Fish' }],
      ['update_pet_info', { pet_id: tweety?.id, description: 'Sings at dawn.' }],
      ['search_pets', { species: 'Cat' }],
      ['get_available_pets', {}],
      ['get_pets_summary', {}],
      ['get_valid_species', {}],
      ['get_adoption_stats', {}],
      ['adopt_pet_by_name', { pet_name: 'Tweety' }],
      ['delete_pet', { pet_name: 'Bubbles' }]
    ];

    for (const [name, args] of calls) {
      const result = await executeTool(name, args, context);
      expect(result.isError, name).toBe(false);
      expect(findToolDefinition(name)?.output.safeParse(result.structuredContent).success, name).toBe(true);
    }
  });
});
