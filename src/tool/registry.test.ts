// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createToolRegistry } from './registry.ts';
import type { Tool } from './types.ts';

function searchTool(): Tool {
  return {
    kind: 'base',
    definition: {
      name: 'search',
      description: 'Search things',
      parameters: [
        { name: 'query', type: 'string', description: 'What to look for', required: true },
        { name: 'page', type: 'integer', description: 'Page number', required: false },
        { name: 'scope', type: 'string', description: 'Where to look', required: false, enum_values: ['all', 'recent'] },
      ],
    },
    handler: async () => 'ok',
  };
}

describe('ToolRegistry', () => {
  describe('registration', () => {
    it('registers a tool and returns it by name', () => {
      const registry = createToolRegistry();
      registry.register(searchTool());

      expect(registry.get('search')?.definition.name).toBe('search');
      expect(registry.get('missing')).toBeNull();
      expect(registry.getDefinitions().map((d) => d.name)).toEqual(['search']);
    });

    it('throws when registering a duplicate tool name', () => {
      const registry = createToolRegistry();
      registry.register(searchTool());

      expect(() => registry.register(searchTool())).toThrow('tool already registered: search');
    });
  });

  describe('toModelTools', () => {
    it('adds a required request_heartbeat flag to every schema', () => {
      const registry = createToolRegistry();
      registry.register(searchTool());

      const [tool] = registry.toModelTools();

      expect(tool?.input_schema.required).toEqual(['query', 'request_heartbeat']);
      expect(tool?.input_schema.properties['request_heartbeat']?.type).toBe('boolean');
      expect(tool?.input_schema.properties['scope']?.enum).toEqual(['all', 'recent']);
    });

    it('selects by name in the given order and skips unknown names', () => {
      const registry = createToolRegistry();
      registry.register(searchTool());
      registry.register({
        kind: 'sandboxed',
        definition: { name: 'roll_dice', description: 'Roll', parameters: [] },
        source_code: 'function roll_dice() { return 4; }',
      });

      expect(registry.toModelTools(['roll_dice', 'nope', 'search']).map((t) => t.name)).toEqual([
        'roll_dice',
        'search',
      ]);
    });
  });

  describe('validateArguments', () => {
    const registry = createToolRegistry();
    registry.register(searchTool());

    it('accepts well-formed arguments', () => {
      expect(registry.validateArguments('search', { query: 'cats', page: 2, scope: 'all' })).toBeNull();
    });

    it('reports a missing required parameter', () => {
      expect(registry.validateArguments('search', {})).toBe('missing required parameter: query');
    });

    it('reports a wrong type', () => {
      expect(registry.validateArguments('search', { query: 'cats', page: 1.5 })).toBe(
        'invalid type for parameter page: expected integer, got number',
      );
      expect(registry.validateArguments('search', { query: null })).toBe(
        'invalid type for parameter query: expected string, got null',
      );
    });

    it('reports a value outside the enum', () => {
      expect(registry.validateArguments('search', { query: 'cats', scope: 'old' })).toBe(
        'invalid value for parameter scope: expected one of all, recent',
      );
    });

    it('reports unexpected parameters', () => {
      expect(registry.validateArguments('search', { query: 'cats', extra: true })).toBe('unexpected parameter: extra');
    });

    it('reports unknown tools', () => {
      expect(registry.validateArguments('nope', {})).toBe('unknown tool: nope');
    });
  });
});
