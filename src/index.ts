export * from './core/types';
export { Board, type PremiumSquare } from './core/board';
export { BOARD_SIZE, CENTER, coordKey } from './core/boardLayout';
export { RACK_SIZE, TileBag, buildTiles, getInitialBagSize, rackPoints, tileValue, variantSupply } from './core/tiles';
export { createSeededRandom, SeededRandom } from './core/random';
export { checkPlacementRules } from './core/rules';
export { BINGO_BONUS, consumePremiums, scoreMove, scoreWords, type MoveScore } from './core/scoring';
export { consumeRack, removeFromRack, resolveRackUsage } from './core/rack';
export { ScrabbleGame, type GameSnapshot, type GameState, type GameStatus } from './core/game';
export { loadSnapshot, restoreGame, saveSnapshot, SaveStateError, serializeGame } from './core/saveState';

export { cachedLexicon, Lexicon, loadLexiconFile, parseLexicon } from './dictionary/dictionaryService';
export { LexiconJudge, type DictionaryJudge, type JudgeVerdict, type WordVerdict } from './dictionary/judge';
export { judgeMove, validateExchange, validateMove, validateMoveRules, type ValidatedMove } from './dictionary/moveValidator';

export { arbitrate, type ArbitrationOutcome, type ArbitrationRequest, type ToolSetup } from './ai/arbiter';
export { selectWinner, type ArbitratedMove, type Candidate, type CandidateStatus } from './ai/candidate';
export { movePayloadSchema, type MovePayload } from './ai/moveSchema';
export { parseMove, providerReconstructor, type ParsedMove, type ParseMethod } from './ai/moveParser';
export { callWithFallback, callWithTimeout } from './ai/providerCall';
export { DEFAULT_RETRY_POLICY, resolveRetryPolicy, type RetryPolicy } from './ai/retryPolicy';
export { ConversationSession } from './ai/session';
export { runToolLoop, type ExplorationPolicy } from './ai/toolLoop';
export { createToolRegistry, defineTool, ToolRegistry, ToolRegistryError, type ToolContext } from './ai/tools';
export type * from './ai/types';

export { ConfigError, judgeFromConfig, loadConfig, type AppConfig } from './config';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger';
