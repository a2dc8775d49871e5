/**
 * Centralized regex handling for user-provided patterns.
 *
 * Every pattern that reaches the search engine goes through UserRegex, which
 * runs on RE2 for linear-time matching.
 *
 * Usage:
 *   import { createUserRegex } from '../regex/index.js';
 *
 *   const regex = createUserRegex(userPattern, true);
 *   for (const m of regex.matchAll(line)) { ... }
 */

export {
  createUserRegex,
  type RegexMatch,
  UserRegex,
} from "./user-regex.js";
