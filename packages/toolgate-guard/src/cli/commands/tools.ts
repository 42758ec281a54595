import { getToolDefinitions } from '../../tools/definitions.js';

export const toolsCommands = {
  async list(options: { nonInteractive?: boolean; allow?: string[] } = {}): Promise<void> {
    const definitions = getToolDefinitions({
      interactive: options.nonInteractive !== true,
      allowedTools: options.allow,
    });
    console.log(JSON.stringify(definitions, null, 2));
  },
};
