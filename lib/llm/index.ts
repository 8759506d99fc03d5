/**
 * LLM module exports
 */

export { OpenAICompletionClient } from './client';
export type { CompletionClient, CompletionResult, OpenAICompletionOptions } from './client';

export { DocumentationGenerator } from './documentation';
export type { SheetDocumentation, WorkbookDocumentation } from './documentation';

export { groupFormulasByPattern, patternKey } from './patterns';
export type { FormulaPattern } from './patterns';

export { SYSTEM_PROMPT, buildSheetPrompt } from './prompts';
