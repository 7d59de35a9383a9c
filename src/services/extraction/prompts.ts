import type { ExtractionPromptName } from './types.js';

/**
 * Templates used when Langfuse is not configured or unreachable. Placeholders are
 * `{{name}}`; `{{document_text}}` is always provided.
 */
export const FALLBACK_PROMPTS: Record<ExtractionPromptName, string> = {
  'contract-extraction': `You read Brazilian public-sector contracts and return their key data as JSON.

Return a single JSON object with exactly these keys:
- "numero_contrato": contract number as written (e.g. "123/2025"), or null
- "valor_contrato": total value as written, including "R$" (e.g. "R$ 1.234.567,89"), or null
- "data_assinatura": signature date as DD/MM/YYYY, or null
- "objeto": the contract object in one sentence, or null
- "partes": { "contratante": contracting public body, "contratada": contracted company }
- "prazo": { "data_inicio": start date DD/MM/YYYY, "data_fim": end date DD/MM/YYYY }

Use null for anything the document does not state. Do not invent values.

Processo: {{processo}}

Document:
{{document_text}}`,

  'publication-extraction': `You read pages of the Rio de Janeiro official gazette (Diario Oficial) and find the
contract excerpt ("EXTRATO") for one administrative processo.

Processo: {{processo}}

Return a single JSON object with exactly these keys:
- "processo_matched": true only if the page contains an excerpt for this processo
- "tipo_extrato": the excerpt heading (e.g. "EXTRATO DO CONTRATO", "EXTRATO DE TERMO ADITIVO"), or null
- "numero_contrato": contract number, or null
- "valor_contrato": value as written, including "R$", or null
- "data_assinatura": signature date as DD/MM/YYYY, or null
- "objeto": the contract object, or null
- "partes": { "contratante": contracting body, "contratada": contracted company }
- "prazo": { "data_inicio": DD/MM/YYYY or null, "data_fim": DD/MM/YYYY or null }

Read only the excerpt that mentions this processo. Use null for anything it does not state.

Page text:
{{document_text}}`,
};

export const STRICT_OUTPUT_HINT = `

IMPORTANT: your previous answer could not be used. Reply with ONE JSON object only, no prose,
no markdown fences, using exactly the keys listed above. Every value must be a string, null,
a boolean (processo_matched only) or one of the two nested objects.`;

export function fillTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => variables[name] ?? match);
}
