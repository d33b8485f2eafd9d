/**
 * Prompt text for technique generation
 */

import type { ReconBrief } from "./recon.js";
import type { Strategy } from "./strategies.js";

/** Payload characters shown per recent bypass in the brief */
const BYPASS_PREVIEW_LENGTH = 120;

export const GENERATION_SYSTEM_PROMPT = `You are an offensive security researcher running automated reconnaissance against a web application firewall. Your job is to find attack techniques that slip past both pattern-based and model-based detection.

You understand parser differentials between servers and frameworks, layered encodings that defeat single-pass decoders, how the same payload behaves in a query string, a JSON body, an XML attribute, a multipart field or a header, and how intent can be split across several harmless-looking fields.

Every technique must be a complete, realistic raw HTTP request: request line, headers, and body where applicable.

Severity guide:
- critical: full compromise (RCE, admin auth bypass, SSRF to cloud metadata)
- high: data exfiltration or significant impact (SQLi dump, stored XSS, file read)
- medium: limited impact or needs chaining
- low: probes and unlikely preconditions

Output ONLY a JSON array of objects with keys: technique_name (descriptive, unique), category (sqli/xss/path_traversal/command_injection/ssrf/rce/header_injection/xxe/auth_bypass/encoding_evasion), raw_payload (complete HTTP request), severity (low/medium/high/critical).`;

export const STRATEGY_INSTRUCTIONS: Record<Strategy, string> = {
  mutate_bypasses: `The recent bypasses listed above got past the firewall. Mutate them: change encoding layers, swap syntax variants, insert comments or whitespace, split the payload across parameters, or move it into a different part of the request. Each variant should evade the same rules.`,
  cross_category: `Build hybrid requests that combine categories: SQL injection inside a JSON field that also carries XSS, SSRF through an XXE entity, command injection chained with path traversal, auth bypass through header injection.`,
  encoding_chains: `Evade through encoding:
- double and triple percent-encoding (%2527 -> %27 -> ')
- fullwidth characters, homoglyphs, overlong UTF-8
- mixed percent-encoding, HTML entities and Unicode escapes in one payload
- null bytes (%00) to truncate strings
- case changes and inline comments (SEL/**/ECT, <ScRiPt>)
- chunked transfer encoding that splits the payload`,
  context_shift: `Deliver known attacks through unusual parts of the request:
- multipart/form-data upload fields
- nested JSON objects and arrays
- headers such as X-Forwarded-For, Referer, User-Agent, Cookie
- GraphQL variables
- WebSocket upgrade requests
- XML attributes and CDATA sections`,
  emerging_techniques: `Use newer technique families:
- server-side template injection ({{7*7}}, \${7*7}, <%= 7*7 %>)
- prototype pollution (__proto__, constructor.prototype)
- GraphQL introspection, batching and alias abuse
- request smuggling (CL.TE, TE.CL, ambiguous Content-Length)
- cache poisoning through unkeyed headers
Map each to the closest category, or encoding_evasion.`,
  target_weak_spots: `These categories have the lowest block rates right now:
{weak_categories}
Target them with your strongest evasion methods.`,
};

/**
 * Difficulty asked of the generator; rises with the scan generation
 */
export function difficultyLabel(generation: number): string {
  if (generation < 3) {
    return "intermediate evasion: encoding tricks and syntax variants";
  }
  if (generation < 8) {
    return "advanced evasion: multi-layer encoding chains, parser differentials, context exploitation";
  }
  return "expert evasion: chained techniques, semantic gaps, unusual HTTP contexts and protocol-level tricks";
}

function weakCategoryLines(brief: ReconBrief): string {
  if (brief.weakCategories.length === 0) {
    return "  (no test data yet)";
  }
  return brief.weakCategories
    .map((c) => `  - ${c.category}: ${c.blocked}/${c.tested} blocked (${Math.round(c.blockRate * 100)}%)`)
    .join("\n");
}

function recentBypassLines(brief: ReconBrief): string {
  if (brief.recentBypasses.length === 0) {
    return "  (none yet)";
  }
  return brief.recentBypasses
    .map((t) => `  - ${t.name} [${t.category}]: ${t.rawPayload.slice(0, BYPASS_PREVIEW_LENGTH)}...`)
    .join("\n");
}

export function buildGenerationPrompt(strategy: Strategy, brief: ReconBrief, count: number): string {
  const weak = weakCategoryLines(brief);
  const instructions = STRATEGY_INSTRUCTIONS[strategy].replace("{weak_categories}", weak);
  const unexplored =
    brief.unexploredCategories.length > 0 ? brief.unexploredCategories.join(", ") : "(all categories covered)";

  return `RECON BRIEF:
- Techniques in catalog: ${brief.totalTechniques}
- Weakest categories:
${weak}
- Under-explored categories: ${unexplored}
- Recent bypasses:
${recentBypassLines(brief)}
- Generation: ${brief.generation}

STRATEGY: ${strategy}
${instructions}

REQUIREMENTS:
- Generate exactly ${count} novel techniques
- Each must be a full raw HTTP request, not a fragment
- Difficulty: ${difficultyLabel(brief.generation)}
- Do not repeat technique names or payloads already in the catalog

Output ONLY the JSON array.`;
}
