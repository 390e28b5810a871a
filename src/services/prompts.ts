/**
 * Prompt templates for the three generation steps.
 *
 * Placeholders use {{name}} and are filled by renderPrompt():
 * - {{fields_description}}: FieldCatalog.describe()
 * - {{query}}: the user's transcribed question
 * - {{columns}}: the validated field set from step A (empty for step A itself)
 *
 * The few-shot examples fix the grammar conventions the evaluation fixtures
 * depend on, in particular the $not wrapping for <, <= and !=.
 */

/**
 * Step A: pick the fields a query needs.
 */
export const COLUMN_SELECTION_PROMPT = `You are a data analysis assistant selecting the fields needed to answer a question about machine-learning evaluation runs.

<fields>
{{fields_description}}
</fields>

Your task is to return ONLY the fields that are directly relevant to answering the query.
Before selecting, reason about which filtering conditions the query needs.

Instructions:
1. Work out which data points the query refers to
2. Select ONLY the fields required to answer it; leave out everything else
3. Use field names exactly as listed above
4. Always include identifier fields (like attributes.model_name) when the query needs to identify specific models or compare models
5. Respond with a single JSON object in this format:
{
  "columns": ["field1", "field2"]
}

<example>
Query: Which model had the highest accuracy?
Reasoning: The model name identifies the model; accuracy decides which is highest.
Output: {"columns": ["attributes.model_name", "output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy"]}
</example>

<example>
Query: Find all the models that had a precision score greater than 0.8
Reasoning: The model name identifies models; precision is filtered above 0.8.
Output: {"columns": ["attributes.model_name", "output.HalluScorerEvaluator.scorer_evaluation_metrics.precision"]}
</example>

<example>
Query: Give me the list of all models that were trained for more than 10 epochs
Reasoning: The model name identifies models; the epoch count is filtered above 10.
Output: {"columns": ["attributes.model_name", "attributes.num_train_epochs"]}
</example>

<example>
Query: Return all the rows where the latency was greater than 100ms
Reasoning: Only the latency metric is needed to apply the threshold.
Output: {"columns": ["output.model_latency.mean"]}
</example>

Query: {{query}}
`;

/**
 * Step B: build the filter expression.
 */
export const QUERY_PROMPT = `You are a data analysis assistant generating filter expressions for a trace store of machine-learning evaluation runs.

<fields>
{{fields_description}}
</fields>

You will be given a query and the fields selected for it. Generate a filter expression that selects the rows the query asks for.

Instructions:
1. Work out the filtering conditions in the query
2. Use ONLY these operators: $eq, $gt, $gte, $and, $or, $not, $contains. Any other operator is invalid.
3. Read fields with {"$getField": "<field>"} and constants with {"$literal": <value>}
4. Always wrap numeric fields in {"$convert": {"input": ..., "to": "double"}} before comparing them
5. Put the field on the left and the constant on the right of every comparison
6. There is no less-than, less-or-equal or not-equal operator:
   - a < b  is written {"$not": [{"$gte": [a, b]}]}
   - a <= b is written {"$not": [{"$gt": [a, b]}]}
   - a != b is written {"$not": [{"$eq": [a, b]}]}
7. Only use the selected fields
8. Respond with a single JSON object in this format:
{
  "query": {
    "$expr": { ... }
  }
}

<example>
<!-- not equal (!=) -->
Query: Runs where the true count is not 0.5
Columns: ['output.hallucination_scorer.scorer_accuracy.true_count']
Output: {"query": {"$expr": {"$not": [{"$eq": [{"$convert": {"input": {"$getField": "output.hallucination_scorer.scorer_accuracy.true_count"}, "to": "double"}}, {"$literal": 0.5}]}]}}}
</example>

<example>
<!-- less than or equal (<=) -->
Query: Runs with at most 0.25 completion tokens on average
Columns: ['output.HalluScorerEvaluator.completion_tokens.mean']
Output: {"query": {"$expr": {"$not": [{"$gt": [{"$convert": {"input": {"$getField": "output.HalluScorerEvaluator.completion_tokens.mean"}, "to": "double"}}, {"$literal": 0.25}]}]}}}
</example>

<example>
<!-- less than (<) -->
Query: Runs with fewer than 0.5 completion tokens on average
Columns: ['output.HalluScorerEvaluator.completion_tokens.mean']
Output: {"query": {"$expr": {"$not": [{"$gte": [{"$convert": {"input": {"$getField": "output.HalluScorerEvaluator.completion_tokens.mean"}, "to": "double"}}, {"$literal": 0.5}]}]}}}
</example>

<example>
<!-- string contains -->
Query: Find all the rows where the model name contains 'gpt'
Columns: ['attributes.model_name']
Output: {"query": {"$expr": {"$contains": {"input": {"$getField": "attributes.model_name"}, "substr": {"$literal": "gpt"}}}}}
</example>

<example>
Query: Find all the rows where the latency was greater than 100ms
Columns: ['output.model_latency.mean']
Output: {"query": {"$expr": {"$gt": [{"$convert": {"input": {"$getField": "output.model_latency.mean"}, "to": "double"}}, {"$literal": 100}]}}}
</example>

<example>
Query: Find models with accuracy above 0.9
Columns: ['attributes.model_name', 'output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy']
Output: {"query": {"$expr": {"$gt": [{"$convert": {"input": {"$getField": "output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy"}, "to": "double"}}, {"$literal": 0.9}]}}}
</example>

<example>
Query: Find models trained for more than 5 epochs with learning rate below 0.001
Columns: ['attributes.model_name', 'attributes.num_train_epochs', 'attributes.learning_rate']
Output: {"query": {"$expr": {"$and": [{"$gt": [{"$convert": {"input": {"$getField": "attributes.num_train_epochs"}, "to": "double"}}, {"$literal": 5}]}, {"$not": [{"$gte": [{"$convert": {"input": {"$getField": "attributes.learning_rate"}, "to": "double"}}, {"$literal": 0.001}]}]}]}}}
</example>

Query: {{query}}
Columns: {{columns}}
`;

/**
 * Step C: build the sort specification.
 */
export const SORT_BY_PROMPT = `You are a data analysis assistant generating sort specifications for a trace store of machine-learning evaluation runs.

<fields>
{{fields_description}}
</fields>

Your task is to generate the ordering a query asks for.

Instructions:
1. Work out whether the query asks for an ordering (highest, lowest, best, top, ascending, descending, ...)
2. If it does, sort by the matching selected field: "desc" for highest/best/most, "asc" for lowest/least/ascending
3. If the query does not ask for an ordering, return an empty list. Never invent a sort field.
4. Only use the selected fields
5. Respond with a single JSON object in this format:
{
  "sort_by": [
    {"field": "<field>", "direction": "asc" | "desc"}
  ]
}

<example>
Query: Find models with the highest accuracy
Columns: ['output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy']
Output: {"sort_by": [{"field": "output.HalluScorerEvaluator.scorer_evaluation_metrics.accuracy", "direction": "desc"}]}
</example>

<example>
Query: Find models with the lowest latency
Columns: ['output.model_latency.mean']
Output: {"sort_by": [{"field": "output.model_latency.mean", "direction": "asc"}]}
</example>

<example>
Query: Return the rows in ascending order of the model precision
Columns: ['output.HalluScorerEvaluator.scorer_evaluation_metrics.precision']
Output: {"sort_by": [{"field": "output.HalluScorerEvaluator.scorer_evaluation_metrics.precision", "direction": "asc"}]}
</example>

<example>
Query: Find all the rows where the model name contains 'gpt'
Columns: ['attributes.model_name']
Output: {"sort_by": []}
</example>

Query: {{query}}
Columns: {{columns}}
`;

export interface PromptVariables {
  fields_description: string;
  query: string;
  columns: string;
}

/**
 * Render a field list the way the few-shot examples show it:
 * ['a', 'b'].
 */
export function formatColumns(fields: readonly string[]): string {
  return `[${fields.map((field) => `'${field}'`).join(', ')}]`;
}

/**
 * Fill {{name}} placeholders in a template.
 *
 * @throws Error if the template names a variable that was not supplied
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  const values: Record<string, string> = { ...variables };
  return template.replace(/\{\{(\w+)\}\}/g, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`Unknown prompt variable: ${name}`);
    }
    return value;
  });
}
