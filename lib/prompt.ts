// lib/prompt.ts
import { PromptFormatError } from "./errors";

export const COMPANY_PLACEHOLDER = "{company_name}";

export const DEFAULT_ANALYSIS_PROMPT = `You are a social media research expert. I need you to find the official Twitter handles for {company_name}.

Company: {company_name}

Please provide:
1. The main company's official Twitter handle

Focus on:
- Official corporate accounts (usually verified with blue checkmark)

Format your response strictly as JSON with the following schema:
{
  "company_name": "{company_name}",
  "main_twitter_handle": "@company_handle"
}

Important:
- Only include verified or clearly official accounts
- Use @ symbol for all handles
- If no Twitter handle is found, use null for the handle field
- Be specific about account types and descriptions
- Only return JSON, no additional text`;

// Validation templates are substituted directly, so literal braces are written doubled.
export const DEFAULT_VALIDATION_PROMPT = `You are a data validation expert. Validate the correctness of the system-generated output.

**INPUT DATA (original companies):**
{input_json}

**EXPECTED OUTPUT (reference example):**
{expected_json}

**ACTUAL OUTPUT (to validate):**
{actual_json}

Ignore:
- Data completeness (not all inputs need to appear in actual)
- Format compliance (don't check structure/schema)
- Missing elements

Focus only on validating the **data values** in \`analysis\`.

Check the following:
1. **Company Name Match**: Does \`company\` exactly equal \`analysis.company_name\`?
2. **Twitter Handle Validity**: Is \`main_twitter_handle\` in the correct format (must start with \`@\`)?
3. **Twitter Handle Accuracy**: Compare with the style/pattern in EXPECTED (e.g., \`Apple Inc.\` → \`@Apple\`, \`Tesla Inc.\` → \`@Tesla\`). Assess if the mapping is reasonable for the company in ACTUAL.
4. **Inconsistencies**: List mismatches between \`company\` and \`analysis.company_name\`, invalid handles, or unlikely mappings.
5. **Final Verdict**: Is the ACTUAL output data correct and usable?

Return only structured JSON:

{{
  "company_name_match": "score/assessment",
  "twitter_handle_validity": "score/assessment",
  "twitter_handle_accuracy": "score/assessment",
  "inconsistencies": ["list of issues"],
  "overall_assessment": "final verdict",
  "recommendations": ["suggestion1", "suggestion2"]
}}`;

export const LEGACY_VALIDATION_PROMPT = `You are a data validation expert. I need you to analyze and compare the following three JSON files:

1. **INPUT DATA**: The original company list that was processed
2. **EXPECTED OUTPUT**: The expected results format and structure
3. **ACTUAL OUTPUT**: The actual results generated

Please analyze these files and provide your assessment:

**INPUT DATA:**
{input_json}

**EXPECTED OUTPUT:**
{expected_json}

**ACTUAL OUTPUT:**
{actual_json}

Please provide your analysis covering:
1. **Data Completeness**: Are all input companies processed?
2. **Format Compliance**: Does the actual output match the expected format?
3. **Data Quality**: Are the results accurate and well-structured?
4. **Missing Elements**: What's missing or incorrect?
5. **Overall Assessment**: Is the result appropriate and usable?

Format your response as structured JSON:
{{
  "data_completeness": "score/assessment",
  "format_compliance": "score/assessment",
  "data_quality": "score/assessment",
  "missing_elements": ["list", "of", "issues"],
  "overall_assessment": "final verdict",
  "recommendations": ["suggestion1", "suggestion2"]
}}`;

/**
 * Drop `//` comments. A line that starts with `//` goes away entirely;
 * otherwise the line is cut at the first `//`.
 */
export function stripComments(template: string): string {
  const kept: string[] = [];

  for (const line of template.split("\n")) {
    const idx = line.indexOf("//");
    if (idx === -1) {
      kept.push(line);
    } else if (idx > 0) {
      kept.push(line.slice(0, idx).trimEnd());
    }
  }

  return kept.join("\n");
}

/**
 * Escape every brace so the template is a valid format string, keeping
 * `{company_name}` as the only live placeholder.
 */
export function cleanPromptTemplate(template: string): string {
  return stripComments(template)
    .replace(/\{/g, "{{")
    .replace(/\}/g, "}}")
    .split("{{company_name}}")
    .join(COMPANY_PLACEHOLDER);
}

/**
 * Brace-format substitution: `{{` → `{`, `}}` → `}`, `{name}` → values[name].
 */
export function substitutePlaceholders(
  template: string,
  values: Record<string, string>
): string {
  let out = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];

    if (ch === "{") {
      if (template[i + 1] === "{") {
        out += "{";
        i += 2;
        continue;
      }
      const close = template.indexOf("}", i + 1);
      if (close === -1) {
        throw new PromptFormatError("Single '{' encountered in format string");
      }
      const field = template.slice(i + 1, close);
      if (!Object.prototype.hasOwnProperty.call(values, field)) {
        throw new PromptFormatError(`Unknown placeholder {${field}}`);
      }
      out += values[field];
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (template[i + 1] === "}") {
        out += "}";
        i += 2;
        continue;
      }
      throw new PromptFormatError("Single '}' encountered in format string");
    }

    out += ch;
    i += 1;
  }

  return out;
}

/**
 * Build the user message for one company. Templates without the
 * placeholder get the company appended instead.
 */
export function formatPrompt(template: string, companyName: string): string {
  const cleaned = cleanPromptTemplate(template);

  if (cleaned.includes(COMPANY_PLACEHOLDER)) {
    return substitutePlaceholders(cleaned, { company_name: companyName });
  }

  return `${cleaned}\n\nCompany to analyze: ${companyName}`;
}
