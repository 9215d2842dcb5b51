export {
  joinRows,
  leftJoin,
  innerJoin,
  mergeRows,
  validateJoinArguments,
} from './join-engine.js'
export type { JoinKind } from './join-engine.js'
