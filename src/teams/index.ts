export type { AfterToolResult, HandoffRule, RoutingPolicy, Team, TeamSnapshot } from './types.js';
export {
  decideNextSpeaker,
  findHandoffMarker,
  matchHandoffRule,
  roundRobinSuccessor,
} from './routing.js';
export type { SpeakerDecision, SpeakerReason } from './routing.js';
export { createTeamCatalog, resolveAgent, snapshotTeam } from './team-catalog.js';
export type { TeamCatalog } from './team-catalog.js';
export { createTeamCoordinator, guidanceFor } from './team-coordinator.js';
export type {
  ResumeError,
  RunTaskOptions,
  RuntimeFactory,
  RuntimeRequest,
  TeamCoordinator,
  TeamCoordinatorOptions,
} from './team-coordinator.js';
