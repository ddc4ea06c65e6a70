/**
 * Strategy Policy - picks the next fetch strategy for a URL
 *
 * Contract shared by every policy:
 * - the choice depends only on the URL, the domain's memory and the
 *   attempts made so far for this URL
 * - a strategy is never repeated while an untried one remains
 *
 * HeuristicStrategyPolicy is deterministic. OracleStrategyPolicy asks an
 * external reasoning oracle and falls back to the rendered browser when the
 * oracle is unavailable or answers badly.
 */

import { z } from 'zod';
import { STRATEGY_ORDER, isStrategyId, type Attempt, type StrategyId } from '../types/index.js';
import { hostOf } from '../utils/url-scope.js';
import { logger } from '../utils/logger.js';
import type { DomainMemoryView } from './domain-memory.js';
import { parseJsonReply, type TextCompletion } from './oracle-client.js';

const log = logger.policy;

export interface StrategyPolicy {
  choose(url: string, memory: DomainMemoryView, attempts: readonly Attempt[]): Promise<StrategyId>;
}

export const FALLBACK_STRATEGY: StrategyId = 'rendered_browser';

/**
 * Strategies not yet tried for this URL, cheapest first. Once all four have
 * been tried, every strategy is a candidate again.
 */
export function untriedStrategies(attempts: readonly Attempt[]): StrategyId[] {
  const tried = new Set(attempts.map((a) => a.strategy));
  const untried = STRATEGY_ORDER.filter((id) => !tried.has(id));
  return untried.length > 0 ? untried : [...STRATEGY_ORDER];
}

/**
 * Deterministic escalation:
 * 1. the cheapest untried strategy that has worked for this domain before
 * 2. otherwise the cheapest untried strategy not marked failed
 * 3. otherwise the cheapest untried strategy
 *
 * A failed attempt is recorded as failed in memory, so each failure moves
 * the choice up one tier.
 */
export class HeuristicStrategyPolicy implements StrategyPolicy {
  async choose(url: string, memory: DomainMemoryView, attempts: readonly Attempt[]): Promise<StrategyId> {
    return chooseHeuristically(url, memory, attempts);
  }
}

export function chooseHeuristically(url: string, memory: DomainMemoryView, attempts: readonly Attempt[]): StrategyId {
  const domain = hostOf(url) ?? url;
  const candidates = untriedStrategies(attempts);
  const successful = memory.successfulStrategies(domain);
  const failed = memory.failedStrategies(domain);

  return (
    candidates.find((id) => successful.has(id)) ??
    candidates.find((id) => !failed.has(id)) ??
    candidates[0] ??
    FALLBACK_STRATEGY
  );
}

// ============================================
// ORACLE-BACKED POLICY
// ============================================

export interface StrategyOracleContext {
  url: string;
  domain: string;
  attempts: readonly Attempt[];
  successful: StrategyId[];
  failed: StrategyId[];
}

export interface StrategyChoice {
  strategy: string;
  reasoning?: string;
}

export interface StrategyOracle {
  chooseStrategy(context: StrategyOracleContext): Promise<StrategyChoice>;
}

const strategyChoiceSchema = z.object({
  method: z.string(),
  reasoning: z.string().optional(),
});

const STRATEGY_DESCRIPTIONS: Record<StrategyId, string> = {
  plain_request: 'Basic HTTP request with a fixed desktop identity',
  rotated_request: 'HTTP request with a rotated identity, richer headers and human pacing',
  rendered_browser: 'Headless browser render, waits for network idle',
  hardened_browser: 'Headless browser with anti-automation-detection hardening',
};

export function buildStrategyPrompt(context: StrategyOracleContext): string {
  const options = STRATEGY_ORDER.map((id, i) => `${i + 1}. ${id} - ${STRATEGY_DESCRIPTIONS[id]}`).join('\n');
  return `Website: ${context.url}
Domain: ${context.domain}
Previous attempts: ${JSON.stringify(context.attempts)}
Known successful methods: ${JSON.stringify(context.successful)}
Known failed methods: ${JSON.stringify(context.failed)}

Choose the best scraping strategy from:
${options}

Consider:
- Sites with bot protection usually need one of the browser strategies
- If previous attempts failed, escalate to more sophisticated methods
- Do not repeat a method that already failed for this URL`;
}

/**
 * Strategy oracle backed by a Claude text completion
 */
export class LlmStrategyOracle implements StrategyOracle {
  constructor(private readonly complete: TextCompletion) {}

  async chooseStrategy(context: StrategyOracleContext): Promise<StrategyChoice> {
    const reply = await this.complete({
      system: "You are an expert web scraping strategist. Return only JSON with 'method' and 'reasoning' fields.",
      prompt: buildStrategyPrompt(context),
      maxTokens: 200,
      temperature: 0.3,
    });
    const parsed = strategyChoiceSchema.parse(parseJsonReply(reply));
    return { strategy: parsed.method.trim(), reasoning: parsed.reasoning };
  }
}

function sortedList(ids: Set<StrategyId>): StrategyId[] {
  return STRATEGY_ORDER.filter((id) => ids.has(id));
}

/**
 * Policy that defers to a StrategyOracle. Unknown ids, repeats while an
 * untried strategy remains, and oracle errors all fall back to the
 * rendered browser, or to the heuristic choice when the rendered browser
 * was already tried.
 */
export class OracleStrategyPolicy implements StrategyPolicy {
  constructor(private readonly oracle: StrategyOracle) {}

  async choose(url: string, memory: DomainMemoryView, attempts: readonly Attempt[]): Promise<StrategyId> {
    const domain = hostOf(url) ?? url;
    const candidates = untriedStrategies(attempts);

    let choice: StrategyChoice;
    try {
      choice = await this.oracle.chooseStrategy({
        url,
        domain,
        attempts,
        successful: sortedList(memory.successfulStrategies(domain)),
        failed: sortedList(memory.failedStrategies(domain)),
      });
    } catch (error) {
      log.warn('Strategy oracle failed, using fallback', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback(url, memory, attempts, candidates);
    }

    const picked = choice.strategy;
    if (isStrategyId(picked) && candidates.includes(picked)) {
      log.info('Oracle chose strategy', { url, strategy: picked, reasoning: choice.reasoning });
      return picked;
    }

    log.warn('Oracle choice rejected, using fallback', { url, strategy: picked });
    return this.fallback(url, memory, attempts, candidates);
  }

  private fallback(
    url: string,
    memory: DomainMemoryView,
    attempts: readonly Attempt[],
    candidates: StrategyId[]
  ): StrategyId {
    return candidates.includes(FALLBACK_STRATEGY)
      ? FALLBACK_STRATEGY
      : chooseHeuristically(url, memory, attempts);
  }
}
