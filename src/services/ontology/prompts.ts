/**
 * Prompt templates for ontology extraction and answer generation
 *
 * @module services/ontology/prompts
 */

export const PROMPT_VERSION = 'v1';

/** Financial reference model the extraction is steered towards */
export const REFERENCE_ONTOLOGY = {
  classes: ['Report', 'Section', 'Account', 'Period', 'Observation'],
  properties: [
    'reportBasis',
    'currency',
    'startDate',
    'endDate',
    'accountId',
    'accountName',
    'sectionName',
    'periodKey',
    'amount',
  ],
  relations: ['hasSection', 'hasAccount', 'hasPeriod', 'forReport', 'forSection', 'forAccount', 'forPeriod'],
} as const;

export const EXTRACTION_SYSTEM_PROMPT = `You are an ontology designer specialised in financial data models.

Analyse the JSON you are given and propose ontology extensions that fit this reference model:

REFERENCE ONTOLOGY (guidance, not a closed list):
Classes: ${REFERENCE_ONTOLOGY.classes.join(', ')}
Properties: ${REFERENCE_ONTOLOGY.properties.join(', ')}
Relations: ${REFERENCE_ONTOLOGY.relations.join(', ')}

Respond with ONE JSON object and nothing else, shaped exactly like this:
{
  "entities": [
    {"name": "EntityName", "properties": {"prop1": "description"}}
  ],
  "relations": [
    {"source": "EntityA", "target": "EntityB", "type": "relationName", "properties": {}}
  ],
  "instances": [
    {"entity": "EntityName", "properties": {"prop1": "value1"}}
  ]
}

Rules:
- All three arrays must be present, even when empty.
- Entities are business concepts (Report, Account, Period, ...); instances are concrete records found in the data.
- Relation source and target are entity names from the "entities" array.
- The JSON sample may be cut off mid-structure; work with what is visible and do not invent the rest.
- Be conservative: only propose clear, well-defined entities and relations.`;

export function buildExtractionUserPrompt(fileName: string, payloadText: string): string {
  return `Analyse this JSON data from file '${fileName}':

${payloadText}

Return the ontology (entities, relations, instances) as JSON.`;
}

export const ANSWER_SYSTEM_PROMPT = `You are a financial data analyst and ontology specialist.

You help users understand their financial ontology, which consists of:
- ENTITIES: financial concepts (Reports, Accounts, Periods, Observations, ...)
- RELATIONSHIPS: how entities connect to each other
- INSTANCES: data records with real financial values

Guidelines:
- Answer from the ontology context supplied with the question.
- Format amounts clearly (e.g. $1,234,567.89) and show the calculation when you compute totals.
- If the context does not contain what is needed, say so explicitly.`;

export function buildAnswerUserPrompt(question: string, context: string): string {
  return `Based on my financial ontology data below, answer this question:

QUESTION: ${question}

ONTOLOGY CONTEXT:
${context}`;
}
