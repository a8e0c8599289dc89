export * from './types.js';
export * from './registry.js';
export { createToolContext, resolveToolSettings } from './context.js';
export { toLangChainTools } from './langchain.js';
export { lsTool } from './ls.js';
export { treeTool } from './tree.js';
export { grepTool } from './grep.js';
export { textViewTool } from './text_view.js';
export { strReplaceEditTool } from './str_replace_edit.js';
export { runCommandTool } from './run_command.js';
export { PathBoundary } from '../utils/boundary.js';
export { CodeuError } from '../utils/errors.js';
export type { ErrorCode, ToolErrorCode } from '../utils/errors.js';
