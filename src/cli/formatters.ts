import chalk from "chalk";

import type { ClassificationOutcome } from "../classify/types.js";
import type { CycleSummary } from "../cycle/types.js";
import type { RedTeamReport } from "../redteam/types.js";
import type { ScoutReport } from "../scout/scout.js";
import type { AggregateStats, CategoryStats, RuleVersion, Severity, Technique } from "../store/schema.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

const OUTPUT_FORMATS: readonly string[] = ["terminal", "json"];

/**
 * Severity colors for terminal output
 */
const SEVERITY_COLORS: Record<Severity, typeof chalk> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.gray,
};

const CLASSIFICATION_COLORS: Record<ClassificationOutcome["classification"], typeof chalk> = {
  MALICIOUS: chalk.red.bold,
  SUSPICIOUS: chalk.yellow,
  SAFE: chalk.green,
};

const RULE = chalk.gray("─".repeat(40));

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * Format a single classification outcome
 */
export function formatVerdict(outcome: ClassificationOutcome): string {
  const color = CLASSIFICATION_COLORS[outcome.classification];
  const verdict = outcome.blocked ? chalk.red.bold("BLOCKED") : chalk.green("PASS");
  return [
    `${verdict} ${color(outcome.classification)} ${chalk.gray(`(${percent(outcome.confidence)})`)}`,
    `  attack:     ${outcome.attackType}`,
    `  classifier: ${outcome.classifier}`,
    `  reason:     ${outcome.reason}`,
    chalk.gray(`  rules v${outcome.rulesVersion}, ${outcome.responseTimeMs.toFixed(1)}ms`),
  ].join("\n");
}

export function formatScoutReport(report: ScoutReport): string {
  const lines = [chalk.bold(`Discovered ${report.discovered} techniques`)];
  lines.push(chalk.gray(`  generation ${report.generation}, strategies: ${report.strategiesUsed.join(", ") || "none"}`));
  if (report.categoriesTouched.length > 0) {
    lines.push(`  categories: ${report.categoriesTouched.join(", ")}`);
  }
  return lines.join("\n");
}

export function formatRedTeamReport(report: RedTeamReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Tested ${report.tested}, blocked ${report.blocked}, bypasses ${report.bypasses.length}`));

  if (report.bypasses.length > 0) {
    lines.push(RULE);
    for (const bypass of report.bypasses) {
      const severity = SEVERITY_COLORS[bypass.severity](`[${bypass.severity}]`);
      lines.push(`  ${severity} ${chalk.white.bold(bypass.name)} ${chalk.gray(`(#${bypass.techniqueId}, ${bypass.category})`)}`);
      lines.push(
        chalk.gray(
          `     ${bypass.verdict.classification} ${percent(bypass.verdict.confidence)} via ${bypass.verdict.classifier}, danger ${bypass.danger.toFixed(2)}`
        )
      );
    }
  }

  for (const error of report.errors) {
    lines.push(chalk.yellow(`  ! ${error.name}: ${error.error}`));
  }

  return lines.join("\n");
}

export function formatCycleSummary(summary: CycleSummary): string {
  const lines = [
    chalk.bold.underline(`Cycle #${summary.cycleId}`),
    `  discovered ${summary.discovered}`,
    `  tested     ${summary.tested} (${summary.blocked} blocked${summary.errored > 0 ? `, ${summary.errored} errored` : ""})`,
    `  bypasses   ${summary.bypasses === 0 ? chalk.green("0") : chalk.red(String(summary.bypasses))}`,
    `  patched    ${summary.patched} (${summary.verified} verified, ${summary.patchRounds} rounds)`,
  ];

  const { hint } = summary;
  if (hint.dominantFailureMode || hint.stillBypassingIds.length > 0) {
    lines.push(RULE);
    lines.push(chalk.yellow(`Next cycle focus: ${hint.dominantFailureMode ?? "residual bypasses"}`));
    if (hint.weakCategories.length > 0) {
      lines.push(chalk.gray(`  weak categories: ${hint.weakCategories.join(", ")}`));
    }
    if (hint.stillBypassingIds.length > 0) {
      lines.push(chalk.gray(`  still bypassing: ${hint.stillBypassingIds.map((id) => `#${id}`).join(" ")}`));
    }
  }

  return lines.join("\n");
}

/**
 * Format the technique catalog, one entry per technique
 */
export function formatTechniques(techniques: Technique[]): string {
  if (techniques.length === 0) {
    return chalk.yellow("No techniques catalogued yet.");
  }

  const lines = [chalk.bold.underline(`Found ${techniques.length} techniques:\n`)];
  for (const technique of techniques) {
    const severity = SEVERITY_COLORS[technique.severity](`[${technique.severity}]`);
    const status = technique.testedAt === null
      ? chalk.gray("untested")
      : technique.blocked
        ? chalk.green("blocked")
        : chalk.red("bypassing");
    lines.push(`  ${severity} ${chalk.white.bold(technique.name)} ${chalk.gray(`(#${technique.id})`)}`);
    lines.push(`     ${chalk.cyan(technique.category)} | ${status} | ${chalk.gray(technique.source)}`);
  }
  return lines.join("\n");
}

export function formatRuleHistory(history: RuleVersion[]): string {
  if (history.length === 0) {
    return chalk.yellow("No rule versions deployed.");
  }
  return history
    .map((rule, index) => {
      const marker = index === 0 ? chalk.green("*") : " ";
      return `${marker} v${rule.version} ${chalk.gray(rule.updatedAt)} ${chalk.cyan(rule.updatedBy)}`;
    })
    .join("\n");
}

export function formatRule(rule: RuleVersion): string {
  return [
    chalk.bold(`Rules v${rule.version}`) + chalk.gray(` (${rule.updatedBy}, ${rule.updatedAt})`),
    RULE,
    chalk.bold("Fast stage instructions:"),
    rule.fastPrompt,
    RULE,
    chalk.bold("Deep stage instructions:"),
    rule.deepPrompt,
  ].join("\n");
}

export function formatStats(stats: AggregateStats, categories: CategoryStats[]): string {
  const lines = [
    chalk.bold.underline("Riposte status"),
    `  requests   ${stats.totalRequests} (${stats.blockedRequests} blocked)`,
    `  techniques ${stats.totalThreats} (${stats.threatsBlocked} blocked, ${stats.blockRate}%)`,
    `  rules      v${stats.rulesVersion}`,
  ];

  if (categories.length > 0) {
    lines.push(RULE);
    for (const category of categories) {
      lines.push(`  ${category.category.padEnd(18)} ${category.blocked}/${category.tested} blocked, ${category.total} total`);
    }
  }

  return lines.join("\n");
}

/**
 * Render `value` as pretty JSON or through its terminal formatter
 */
export function render<T>(value: T, format: OutputFormat, terminal: (value: T) => string): string {
  return format === "json" ? JSON.stringify(value, null, 2) : terminal(value);
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.includes(format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
