export const SYSTEM_PROMPT = `You are a materials-science assistant connected to OPTIMADE databases.
1) Translate the user's request into an OPTIMADE filter. 2) Call the available tools when data is needed. 3) Explain the results clearly.
Typical tools: query_optimade, list_providers, lint_filter.
Validate a filter with lint_filter before querying when you are unsure of its syntax. Never invent results that a tool did not return.
Use precise terminology and answer in the language the user wrote in.`;

export const EXAMPLE_QUERIES = [
  "List the available database providers",
  "Find all materials that contain silver",
  "Find semiconductors with a band gap above 2.0 eV",
  "Check this filter: elements HAS \"Si\" AND nelements>=2",
  "Find lightweight materials with a density below 5 g/cm³",
  "Find materials with a cubic crystal system",
  "Find materials that contain rare-earth elements",
  "Find materials with a band gap between 1.0 and 3.0 eV",
];

export const BANNER = `
================ OPTIMADE MCP Client ================
Ask in natural language, or type a command (help / history / tools / quit).`;

export function helpText(): string {
  const examples = EXAMPLE_QUERIES.map((query) => `  - ${query}`).join("\n");
  return `Commands:
  help      show this message
  history   show the last 5 queries and their answers
  tools     list the tools the MCP server provides
  quit      close the connection and exit

Example queries:
${examples}`;
}
