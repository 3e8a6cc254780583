/**
 * Claude models the engine may be configured with, and their prices
 */

export const CLAUDE_MODELS = [
  'claude-sonnet-4-20250514',
  'claude-opus-4-20250514',
  'claude-3-5-sonnet-20241022',
  'claude-3-5-haiku-20241022',
] as const;

export type ClaudeModel = (typeof CLAUDE_MODELS)[number];

/**
 * USD per million tokens
 */
export const CLAUDE_PRICING: Record<ClaudeModel, { input: number; output: number }> = {
  'claude-sonnet-4-20250514': { input: 3, output: 15 },
  'claude-opus-4-20250514': { input: 15, output: 75 },
  'claude-3-5-sonnet-20241022': { input: 3, output: 15 },
  'claude-3-5-haiku-20241022': { input: 0.8, output: 4 },
};
