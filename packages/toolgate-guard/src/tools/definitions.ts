/**
 * Function-calling definitions for the tools an agent may invoke.
 */

export type ToolName =
  | 'Read'
  | 'Write'
  | 'Edit'
  | 'ReadFiles'
  | 'Bash'
  | 'Glob'
  | 'Grep'
  | 'InstallPackage'
  | 'AskUserQuestion';

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'array';
  description: string;
  items?: { type: 'string' };
}

export interface ToolDefinition {
  type: 'function';
  function: {
    name: ToolName;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

function defineTool(
  name: ToolName,
  description: string,
  properties: Record<string, JsonSchemaProperty>,
  required: string[],
): ToolDefinition {
  return { type: 'function', function: { name, description, parameters: { type: 'object', properties, required } } };
}

const str = (description: string): JsonSchemaProperty => ({ type: 'string', description });

export const CORE_TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  defineTool(
    'Read',
    'Read file content. Files over the size limit must be read in line ranges: use Grep to find ' +
      'line numbers, then Read with offset and limit.',
    {
      file_path: str('Path to file'),
      offset: { type: 'integer', description: 'Start reading from this line number (1-indexed). Optional.' },
      limit: { type: 'integer', description: 'Maximum number of lines to return. Optional.' },
    },
    ['file_path'],
  ),
  defineTool(
    'Write',
    'Write content to file',
    { file_path: str('Path to file'), content: str('Content to write') },
    ['file_path', 'content'],
  ),
  defineTool(
    'Edit',
    'Edit a file by replacing an exact string match. old_string must appear exactly once. ' +
      'Safer than Write for small changes.',
    {
      file_path: str('Path to file'),
      old_string: str('Exact string to find and replace (must be unique in file)'),
      new_string: str('Replacement string'),
    },
    ['file_path', 'old_string', 'new_string'],
  ),
  defineTool(
    'ReadFiles',
    'Read multiple files at once. Returns JSON dict of path->content.',
    { file_paths: { type: 'array', items: { type: 'string' }, description: 'List of file paths to read' } },
    ['file_paths'],
  ),
  defineTool('Bash', 'Run bash command', { command: str('Command to run'), workdir: str('Working directory') }, [
    'command',
  ]),
  defineTool('Glob', 'List files matching pattern', { pattern: str('Glob pattern'), workdir: str('Working directory') }, [
    'pattern',
  ]),
  defineTool(
    'Grep',
    'Search file contents for a regex pattern. Returns matching lines.',
    {
      pattern: str('Regex pattern to search for'),
      path: str('Directory to search in (default .)'),
      include: str("File glob filter (e.g. '*.py')"),
    },
    ['pattern'],
  ),
  defineTool(
    'InstallPackage',
    "Install a package using the project's package manager",
    { package_name: str('Name of package to install') },
    ['package_name'],
  ),
];

export const ASK_USER_DEFINITION: ToolDefinition = defineTool(
  'AskUserQuestion',
  'Ask user a question',
  {
    question: str('The question to ask'),
    options: { type: 'array', items: { type: 'string' }, description: 'Options' },
  },
  ['question'],
);

export interface ToolDefinitionOptions {
  /** AskUserQuestion is offered only to interactive sessions */
  interactive: boolean;
  /** When set, only these tools are returned */
  allowedTools?: readonly string[];
}

export function getToolDefinitions(options: ToolDefinitionOptions): ToolDefinition[] {
  const defs = [...CORE_TOOL_DEFINITIONS];
  if (options.interactive) {
    defs.push(ASK_USER_DEFINITION);
  }
  const allowed = options.allowedTools;
  if (allowed !== undefined) {
    return defs.filter(d => allowed.includes(d.function.name));
  }
  return defs;
}
