import nunjucks from 'nunjucks';

// Markdown output: nothing is HTML-escaped, and block tags leave no blank lines behind.
const environment = new nunjucks.Environment(null, {
  autoescape: false,
  trimBlocks: true,
  lstripBlocks: true,
});

export const matrixTemplate = nunjucks.compile(
  `# {{ title }}

| Requirement | Ecosystem | Test | Outcome |
|---|---|---|---|
{% for row in rows %}
| {{ row.requirement }} | {{ row.ecosystem }} | {{ row.test }} | {{ row.outcome }} |
{% endfor %}
`,
  environment,
);

export const validationTemplate = nunjucks.compile(
  `# {{ title }}

- **Requirements**: {{ summary.total }}
- **Covered**: {{ summary.covered }} ({{ summary.percentages.covered }}%)
- **Passed**: {{ summary.passed }} ({{ summary.percentages.passed }}%)
- **Failed**: {{ summary.failed }} ({{ summary.percentages.failed }}%)
- **Skipped**: {{ summary.skipped }} ({{ summary.percentages.skipped }}%)
- **Unknown**: {{ summary.unknown }} ({{ summary.percentages.unknown }}%)
- **Tests without results**: {{ summary.unresolvedTests }}
{% if failing.length %}

## Failing Requirements

{% for item in failing %}
- {{ item.id }}: {{ item.tests }}
{% endfor %}
{% endif %}
{% if uncovered.length %}

## Uncovered Requirements

{% for id in uncovered %}
- {{ id }}
{% endfor %}
{% endif %}
{% if unresolved.length %}

## Unresolved Tests

{% for item in unresolved %}
- {{ item.test }} ({{ item.requirements }})
{% endfor %}
{% endif %}

## Per-Requirement Status

| Requirement | Overall | Tests |
|---|---|---|
{% for row in rows %}
| {{ row.id }} | {{ row.status }} | {{ row.tests }} |
{% endfor %}
`,
  environment,
);
