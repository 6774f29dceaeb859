import { z } from 'zod';
import type { ToolDefinition } from './tool-catalog.js';
import type { ToolManager } from './tool-manager.js';

export const SEARCH_TOOLS_NAME = 'search_tools';

/**
 * Builds the meta-tool definition; `categories` become the enum of the
 * optional category filter.
 */
export function createSearchToolDefinition(categories: string[]): ToolDefinition {
  return {
    name: SEARCH_TOOLS_NAME,
    description:
      'Search for and load tools by describing what you want to do. After searching, the matching tools ' +
      'will be automatically loaded and available for immediate use in your next action. You should search ' +
      'for tools and then use them in the same conversation turn when possible.',
    parameters: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: "What you want to do (e.g., 'greet someone', 'tell the time')",
        },
        category: {
          type: 'string',
          description: 'Optional category filter',
          ...(categories.length > 0 ? { enum: categories } : {}),
        },
      },
      required: ['query'],
      additionalProperties: false,
    },
    strict: true,
  };
}

const SearchToolArgsSchema = z.object({
  query: z.string().min(1),
  category: z.string().min(1).nullish(),
});

/**
 * Local function behind `search_tools`: runs the search (activating hits as a
 * side effect) and returns the ranked matches as indented JSON.
 */
export function createSearchToolFunction(manager: ToolManager): (args: Record<string, unknown>) => Promise<string> {
  return async (args) => {
    const { query, category } = SearchToolArgsSchema.parse(args);
    const matches = await manager.search(query, category ? { category } : {});
    return JSON.stringify(matches, null, 2);
  };
}
