/**
 * Core types for lorebinder-mcp
 */

// ============================================
// NAME SORTING
// ============================================

/**
 * Category -> canonical names, unique within a category, first-seen order.
 */
export type CategorizedNames = Record<string, string[]>;

// ============================================
// ATTRIBUTES
// ============================================

/**
 * A single attribute value as produced by the analysis step.
 * Nested mappings carry keyed details such as relationships.
 */
export type AttributeValue = string | string[] | AttributeMap;

export interface AttributeMap {
  [key: string]: AttributeValue;
}

/** attribute -> value */
export type NameAttributes = Record<string, AttributeValue>;

/** category -> name -> attribute -> value, for one chapter */
export type ChapterAttributes = Record<string, Record<string, NameAttributes>>;

/** chapter id -> ChapterAttributes */
export type BookChapters = Record<string, ChapterAttributes>;

// ============================================
// LOREBINDER
// ============================================

/** chapter id -> value */
export type ChapterValues = Record<string, AttributeValue>;

/**
 * attribute -> chapter id -> value.
 * The reserved "summary" attribute holds a plain string instead.
 */
export type NameEntry = Record<string, ChapterValues | string>;

/** category -> name -> NameEntry */
export type Lorebinder = Record<string, Record<string, NameEntry>>;

export const SUMMARY_KEY = 'summary';

// ============================================
// PROMPTS
// ============================================

export interface PromptTuple {
  category: string;
  name: string;
  prompt: string;
}

export interface PromptOptions {
  threshold?: number;
}

export interface SummaryInput {
  category: string;
  name: string;
  summary: string;
}

// ============================================
// TOOL RESULTS
// ============================================

export interface ToolError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================
// CONFIG
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Config {
  promptChapterThreshold: number;
  noneFoundSentinel: string;
  narratorAliases: string[];
  binderTtlS: number;
  binderStoreSize: number;
  logLevel: LogLevel;
}
