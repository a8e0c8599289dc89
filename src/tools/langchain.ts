import { tool } from '@langchain/core/tools';
import type { StructuredTool } from '@langchain/core/tools';
import type { ToolRegistry } from './registry.js';

/**
 * One LangChain tool per registry name and alias. Failures come back as
 * "Error: ..." text so the model can read them and try again.
 */
export function toLangChainTools(registry: ToolRegistry): StructuredTool[] {
  return registry.list().flatMap((definition) =>
    [definition.name, ...(definition.aliases ?? [])].map((name) =>
      tool(
        async (input) => {
          const outcome = await registry.execute(name, input);
          return outcome.output;
        },
        {
          name,
          description:
            name === definition.name ? definition.description : `${definition.description} (alias of ${definition.name})`,
          schema: definition.schema,
        }
      )
    )
  );
}
