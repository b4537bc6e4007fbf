/**
 * Agents: role definitions and the runtime that turns an agent's view of the
 * conversation into its next output.
 */
export type { AgentDefinition, AgentOutput, TeammateInfo } from './types.js';
export { buildSystemPrompt, createAgentRuntime, stripCompletionToken } from './agent-runtime.js';
export type { AgentRuntime, AgentRuntimeOptions, AgentStepError, StepOptions } from './agent-runtime.js';
export { renderHistory, renderToolResult } from './history-view.js';
export { pickSpeaker } from './speaker-choice.js';
