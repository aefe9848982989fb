export const DATE_RANGE_PROMPT = `SYSTEM PROMPT (Date Range Agent)

**Fields to extract from document:**
{fields_to_extract}

<document>
{chunk}
</document>

**Instructions:**
Extract the \`start_date\` and \`end_date\` covered by the publication metadata above. Ensure that:
- Dates are in the \`YYYY-MM-DD\` format.
- \`start_date\` is the first day of the starting month.
- \`end_date\` is the last day of the ending month.
- If only a single month is given, both dates fall in that month.
- If only a year is given, the range covers the whole year.

**Output Format:**
Provide the results in JSON format ({json_keys}):
{{
  "start_date": "YYYY-MM-DD",
  "end_date": "YYYY-MM-DD"
}}`;
