/**
 * @file Shared Utility Library - Entry Point
 * @description Unified exports for utilities shared by the converters and the CLI
 * @depends result
 */

// ====== Result Type ======

export {
  type Ok,
  type Err,
  type Result,
  ok,
  err,
  partition,
} from './result';
