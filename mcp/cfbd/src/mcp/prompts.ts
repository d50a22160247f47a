/**
 * Prompt templates for common analysis requests.
 *
 * Prompt arguments arrive as strings, so flags and years stay strings here.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

type PromptResult = {
  messages: { role: 'user'; content: { type: 'text'; text: string } }[];
};

function userMessage(text: string): PromptResult {
  return {
    messages: [
      {
        role: 'user',
        content: { type: 'text', text },
      },
    ],
  };
}

export function analyzeGamePrompt(gameId: string, includeAdvancedStats?: string): PromptResult {
  const advanced = includeAdvancedStats?.trim().toLowerCase() === 'true';
  return userMessage(
    `Using the College Football Data API, analyze game ${gameId}. ` +
      'Start with the final score, the scoring drives and the key plays.' +
      (advanced
        ? ' Then pull the advanced box score and explain the efficiency, explosiveness and havoc numbers behind the result.'
        : '')
  );
}

export function analyzeTeamPrompt(team: string, year: string): PromptResult {
  return userMessage(
    `Using the College Football Data API, analyze ${team}'s ${year} season. ` +
      'Cover their record, their most important games, where they were ranked and their overall statistics.'
  );
}

export function analyzeTrendsPrompt(year: string, metric: string): PromptResult {
  return userMessage(
    `Using the College Football Data API, look at how ${metric} changed week by week during the ${year} season. ` +
      'Point out the weeks that stand out and what drove them.'
  );
}

export function compareTeamsPrompt(team1: string, team2: string, year: string): PromptResult {
  return userMessage(
    `Using the College Football Data API, compare ${team1} and ${team2} in the ${year} season. ` +
      'Include their head-to-head game if they played, their records, any common opponents and their statistical performance.'
  );
}

export function analyzeRivalryPrompt(team1: string, team2: string, startYear?: string): PromptResult {
  const span = startYear ? ` since ${startYear}` : '';
  return userMessage(
    `Using the College Football Data API, review every ${team1} vs ${team2} game${span}. ` +
      'Summarize the series record, the closest games, the biggest upsets and any streaks.'
  );
}

export function registerPrompts(server: McpServer): void {
  server.prompt(
    'analyze-game',
    'Get detailed analysis of a specific game',
    {
      game_id: z.string().describe('Game ID to analyze'),
      include_advanced_stats: z
        .string()
        .optional()
        .describe('Whether to include advanced statistics (true/false)'),
    },
    ({ game_id, include_advanced_stats }) => analyzeGamePrompt(game_id, include_advanced_stats)
  );

  server.prompt(
    'analyze-team',
    "Analyze a team's performance for a given season",
    {
      team: z.string().describe('Team name (e.g. Alabama)'),
      year: z.string().describe('Season year'),
    },
    ({ team, year }) => analyzeTeamPrompt(team, year)
  );

  server.prompt(
    'analyze-trends',
    'Analyze trends over a season',
    {
      year: z.string().describe('Season year'),
      metric: z.string().describe('Metric to analyze (scoring, attendance, upsets)'),
    },
    ({ year, metric }) => analyzeTrendsPrompt(year, metric)
  );

  server.prompt(
    'compare-teams',
    'Compare the performance of two teams',
    {
      team1: z.string().describe('First team name'),
      team2: z.string().describe('Second team name'),
      year: z.string().describe('Season year'),
    },
    ({ team1, team2, year }) => compareTeamsPrompt(team1, team2, year)
  );

  server.prompt(
    'analyze-rivalry',
    'Analyze historical rivalry matchups',
    {
      team1: z.string().describe('First team name'),
      team2: z.string().describe('Second team name'),
      start_year: z.string().optional().describe('Starting year for analysis'),
    },
    ({ team1, team2, start_year }) => analyzeRivalryPrompt(team1, team2, start_year)
  );
}
