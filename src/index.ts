export {
  ExpansionSession,
  type ResolvedExpansion,
  type SessionOptions,
} from "./expander/session.js";
export {
  DEFAULT_RULE_FLAGS,
  normalizeRuleTable,
  resolveDefaultFlags,
  type RuleConfig,
  type RuleOutputConfig,
  type RuleTable,
  type RuleTableEntry,
} from "./expander/rules.js";
export {
  createSessionFromConfig,
  loadRuleConfig,
  sessionOptionsFromConfig,
  RULE_FILE_CANDIDATES,
  type LoadedRuleConfig,
  type LoadRuleConfigOptions,
} from "./expander/config-loader.js";
export { ConfigFileError, RuleConfigError } from "./expander/errors.js";
export { matchCase } from "./expander/case-format.js";
export { planKeystrokes, type KeystrokePlan } from "./expander/keystrokes.js";
export { applyKeystroke, replayInput, type ReplayOptions } from "./expander/replay.js";
export { IdleResetTimer } from "./expander/idle-timer.js";
export {
  createMatchEngine,
  DEFAULT_HISTORY_DEPTH,
  StateManager,
  type Partition,
  type StateManagerOptions,
} from "./engine/state-manager.js";
export {
  ENGINE_KINDS,
  type EngineKind,
  type MatchEngine,
  type WalkerSnapshot,
} from "./engine/match-engine.js";
export { AutomatonWalker } from "./engine/automaton-walker.js";
export { TrieWalker } from "./engine/trie-walker.js";
export { Automaton, compileAutomaton, type AutomatonState } from "./engine/automaton.js";
export { buildTrieSet, decorateTrieSet, type TrieNode, type TrieSet } from "./engine/trie.js";
export { AutomatonInvariantError } from "./engine/errors.js";
export { compareRules, pickHighest } from "./engine/priority.js";
export { endCharsFrom, isDefaultEndChar } from "./engine/end-chars.js";
export type {
  EndCharPredicate,
  ExpansionRule,
  OutputCallback,
  OutputValue,
  RuleFlags,
  RuleOutput,
} from "./engine/types.js";
