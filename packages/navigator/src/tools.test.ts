import { beforeEach, afterEach, describe, test, expect, vi } from 'vitest';
import { buildSchedule } from './__fixtures__/schedule';
import { NavigationNode } from './navigation';
import { handleToolCall, navigate, TOOLS } from './tools';

describe('navigate tool', () => {
  const root = NavigationNode.root(buildSchedule());

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should be the only tool offered', () => {
    expect(TOOLS.map((tool) => tool.name)).toEqual(['navigate']);
  });

  test('should return the report of one command', () => {
    expect(handleToolCall('navigate', { command: 'stops.A.routes.list' }, root)).toEqual({
      content: [{ type: 'text', text: 'R1: Red Line\nR3: Elm Crosstown (39)' }],
    });
  });

  test('should say so when a command prints nothing', () => {
    expect(navigate({ command: 'routes.R2.trips.list' }, root).content[0].text).toBe('(no output)');
  });

  test('should turn a failed command into an error response', () => {
    expect(handleToolCall('navigate', { command: 'routes.R9.info' }, root)).toEqual({
      content: [
        { type: 'text', text: 'Error: Error interpreting routes command: Invalid command: R9.info' },
      ],
      isError: true,
    });
  });

  test('should require a command argument', () => {
    const response = handleToolCall('navigate', {}, root);

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe("Error: Argument 'command' must be a non-empty string");
    expect(() => navigate(undefined, root)).toThrow("Argument 'command' must be a non-empty string");
  });

  test('should reject an unknown tool', () => {
    const response = handleToolCall('plan_journey', { from: 'A', to: 'B' }, root);

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe('Error: Unknown tool: plan_journey');
  });
});
