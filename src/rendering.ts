import * as nunjucks from "nunjucks";
import { ParameterCondition } from "./conditions";
import type { Branch } from "./conditions";
import type { InputTemplate } from "./input_template";
import type { MetadataRecord } from "./metadata";
import type { MetaField } from "./metafields";
import type { MetaFieldRule, OutputTemplate } from "./output_template";
import type { OutputEntry, Profile } from "./profile";
import type { ParameterValue } from "./types";

// XML output: values and attributes must be escaped
const xmlEnv = new nunjucks.Environment(undefined, { autoescape: true, trimBlocks: true, lstripBlocks: true });
xmlEnv.addFilter("yesno", (value: unknown) => (value ? "yes" : "no"));

const METADATA_XML = `<?xml version="1.0" encoding="UTF-8"?>
<metadata format="{{ format }}"{% if mimetype %} mimetype="{{ mimetype }}"{% endif %}{% if schema %} schema="{{ schema }}"{% endif %}{% if inputtemplate %} inputtemplate="{{ inputtemplate }}"{% endif %}>
{% for key, value in attributes %}
  <meta id="{{ key }}">{{ value }}</meta>
{% endfor %}
{% if provenance %}
  <provenance outputtemplate="{{ provenance.outputTemplateId }}"{% if provenance.profileId %} profile="{{ provenance.profileId }}"{% endif %}{% if provenance.serviceId %} service="{{ provenance.serviceId }}"{% endif %}>
{% for file in provenance.inputFiles %}
    <inputfile template="{{ file.templateId }}" sequence="{{ file.sequence }}">{{ file.filename }}</inputfile>
{% endfor %}
{% for id, value in provenance.parameters %}
    <parameter id="{{ id }}">{{ value }}</parameter>
{% endfor %}
  </provenance>
{% endif %}
</metadata>
`;

const INPUT_TEMPLATE_XML = `<InputTemplate id="{{ id }}" format="{{ format }}" label="{{ label }}"{% if mimetype %} mimetype="{{ mimetype }}"{% endif %}{% if schema %} schema="{{ schema }}"{% endif %} unique="{{ unique | yesno }}"{% if filename %} filename="{{ filename }}"{% endif %}{% if extension %} extension="{{ extension }}"{% endif %}{% if acceptarchive %} acceptarchive="yes"{% endif %}>
{% for p in parameters %}
  <{{ p.type }}Parameter id="{{ p.id }}" name="{{ p.name }}" required="{{ p.required | yesno }}"{% if p.multi %} multi="yes"{% endif %}{% if p.forbid %} forbid="{{ p.forbid | join(',') }}"{% endif %}{% if p.require %} require="{{ p.require | join(',') }}"{% endif %}>
{% if p.description %}
    <description>{{ p.description }}</description>
{% endif %}
{% for value, label in p.choices %}
    <choice id="{{ value }}">{{ label }}</choice>
{% endfor %}
  </{{ p.type }}Parameter>
{% endfor %}
{% for c in constraints %}
{% if c.values %}
  <metaselect id="{{ c.key }}" operator="{{ c.operator }}">
{% for option in c.values %}
    <option>{{ option }}</option>
{% endfor %}
  </metaselect>
{% else %}
  <meta id="{{ c.key }}" operator="{{ c.operator }}">{{ c.value }}</meta>
{% endif %}
{% endfor %}
</InputTemplate>
`;

const CONDITION_XML = `<conditional{% if disjunction %} disjunction="yes"{% endif %}>
<if>
{% for c in conditions %}
<{{ c.operator }} parameter="{{ c.key }}">{{ c.value }}</{{ c.operator }}>
{% endfor %}
</if>
<then>
{{ thenBranch | safe }}
</then>
{% if elseBranch %}
<else>
{{ elseBranch | safe }}
</else>
{% endif %}
</conditional>`;

const OUTPUT_TEMPLATE_XML = `<OutputTemplate id="{{ id }}" format="{{ format }}" label="{{ label }}"{% if mimetype %} mimetype="{{ mimetype }}"{% endif %}{% if schema %} schema="{{ schema }}"{% endif %} unique="{{ unique | yesno }}"{% if filename %} filename="{{ filename }}"{% endif %}{% if extension %} extension="{{ extension }}"{% endif %}{% if parent %} parent="{{ parent }}"{% endif %}{% if copymetadata %} copymetadata="yes"{% endif %}{% if removeextensions %} removeextensions="{{ removeextensions }}"{% endif %}>
{% for rule in rules %}
{{ rule | safe }}
{% endfor %}
</OutputTemplate>
`;

const META_XML = `<meta id="{{ key }}" operator="{{ operator }}"{% if hasValue %}>{{ value }}</meta>{% else %}/>{% endif %}`;

const PROFILE_XML = `<profile id="{{ id }}"{% if label %} label="{{ label }}"{% endif %}>
<input>
{% for template in inputs %}
{{ template | safe }}
{% endfor %}
</input>
<output>
{% for entry in outputs %}
{{ entry | safe }}
{% endfor %}
</output>
</profile>
`;

function displayValue(value: ParameterValue | undefined): string {
  if (value === undefined) return "";
  return Array.isArray(value) ? value.join(",") : String(value);
}

function renderCondition<T>(condition: ParameterCondition<T>, renderTerminal: (value: T) => string): string {
  const renderBranch = (branch: Branch<T>): string =>
    branch.kind === "terminal" ? renderTerminal(branch.value) : renderCondition(branch.condition, renderTerminal);
  return xmlEnv.renderString(CONDITION_XML, {
    conditions: condition.conditions,
    disjunction: condition.disjunction,
    thenBranch: renderBranch(condition.then),
    elseBranch: condition.otherwise ? renderBranch(condition.otherwise) : undefined,
  }).trim();
}

function renderMetaField(field: MetaField): string {
  const { operator, key, value } = field.toJSON();
  return xmlEnv.renderString(META_XML, { operator, key, value, hasValue: value !== undefined }).trim();
}

function renderRule(rule: MetaFieldRule): string {
  return rule instanceof ParameterCondition ? renderCondition(rule, renderMetaField) : renderMetaField(rule);
}

export function renderMetadata(record: MetadataRecord): string {
  const json = record.toJSON();
  const provenance = json.provenance
    ? {
        ...json.provenance,
        parameters: Object.fromEntries(
          Object.entries(json.provenance.parameters).map(([id, value]) => [id, displayValue(value)])
        ),
      }
    : undefined;
  return xmlEnv.renderString(METADATA_XML, { ...json, provenance });
}

export function renderInputTemplate(template: InputTemplate): string {
  return xmlEnv.renderString(INPUT_TEMPLATE_XML, {
    ...template.toJSON(),
    constraints: template.constraints.map((constraint) => {
      const { key, operator, value } = constraint.toJSON();
      return Array.isArray(value) ? { key, operator, values: value } : { key, operator, value };
    }),
  });
}

export function renderOutputTemplate(template: OutputTemplate): string {
  const json = template.toJSON();
  return xmlEnv.renderString(OUTPUT_TEMPLATE_XML, {
    ...json,
    removeextensions: Array.isArray(json.removeextensions) ? json.removeextensions.join(",") : json.removeextensions,
    rules: template.metafields.map(renderRule),
  });
}

function renderOutputEntry(entry: OutputEntry): string {
  return entry instanceof ParameterCondition
    ? renderCondition(entry, (template) => renderOutputTemplate(template).trim())
    : renderOutputTemplate(entry).trim();
}

export function renderProfile(profile: Profile): string {
  return xmlEnv.renderString(PROFILE_XML, {
    id: profile.id,
    label: profile.label,
    inputs: profile.inputTemplates.map((template) => renderInputTemplate(template).trim()),
    outputs: profile.output.map(renderOutputEntry),
  });
}
