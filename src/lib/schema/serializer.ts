/**
 * Schema document serialization
 * Documents use snake_case keys and spell out every field attribute
 */

import fs from "fs/promises";
import path from "path";
import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import {
  DATA_TYPES,
  type DataType,
  type FieldSpec,
  type JsonValue,
} from "../../types/data-model.js";
import {
  PersistenceError,
  SchemaDefinitionError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { SchemaDefinition } from "./schema-definition.js";

export type SchemaFormat = "json" | "yaml";

export interface FieldDocument {
  name: string;
  data_type: DataType;
  required?: boolean;
  default_value?: JsonValue;
  min_length?: number | null;
  max_length?: number | null;
  min_value?: number | null;
  max_value?: number | null;
  pattern?: string | null;
  choices?: JsonValue[] | null;
  faker_provider?: string | null;
  validator?: string | null;
  description?: string;
}

export interface SchemaDocument {
  name: string;
  description?: string;
  version?: string;
  fields: FieldDocument[];
}

const nullable = (type: string) => ({ type: [type, "null"] });

const SCHEMA_DOCUMENT_SCHEMA = {
  type: "object",
  required: ["name", "fields"],
  properties: {
    name: { type: "string", minLength: 1 },
    description: { type: "string" },
    version: { type: "string" },
    fields: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "data_type"],
        additionalProperties: false,
        properties: {
          name: { type: "string", minLength: 1 },
          data_type: { enum: [...DATA_TYPES] },
          required: { type: "boolean" },
          default_value: {},
          min_length: { type: ["integer", "null"], minimum: 0 },
          max_length: { type: ["integer", "null"], minimum: 0 },
          min_value: nullable("number"),
          max_value: nullable("number"),
          pattern: nullable("string"),
          choices: { type: ["array", "null"] },
          faker_provider: nullable("string"),
          validator: nullable("string"),
          description: { type: "string" },
        },
      },
    },
  },
};

let documentValidator: ValidateFunction<SchemaDocument> | undefined;

function getDocumentValidator(): ValidateFunction<SchemaDocument> {
  if (!documentValidator) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    documentValidator = ajv.compile<SchemaDocument>(SCHEMA_DOCUMENT_SCHEMA);
  }
  return documentValidator;
}

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
  );
}

/**
 * Convert a schema to its declarative document
 */
export function toDocument(schema: SchemaDefinition): SchemaDocument {
  return {
    name: schema.name,
    description: schema.description,
    version: schema.version,
    fields: schema.fields.map(fieldToDocument),
  };
}

function fieldToDocument(field: FieldSpec): FieldDocument {
  return {
    name: field.name,
    data_type: field.dataType,
    required: field.required,
    default_value: structuredClone(field.defaultValue),
    min_length: field.minLength,
    max_length: field.maxLength,
    min_value: field.minValue,
    max_value: field.maxValue,
    pattern: field.pattern,
    choices: field.choices ? structuredClone([...field.choices]) : null,
    faker_provider: field.generationHint,
    validator: field.validator,
    description: field.description,
  };
}

/**
 * Build a schema from a parsed document
 *
 * @throws SchemaDefinitionError if the document is malformed or breaks a field invariant
 */
export function fromDocument(document: unknown): SchemaDefinition {
  const validate = getDocumentValidator();
  if (!validate(document)) {
    const errors = formatAjvErrors(validate.errors);
    throw new SchemaDefinitionError(
      `Invalid schema document: ${errors.join(", ")}`,
      { errors },
    );
  }

  return new SchemaDefinition({
    name: document.name,
    description: document.description ?? "",
    version: document.version ?? "1.0",
    fields: document.fields.map((field) => ({
      name: field.name,
      dataType: field.data_type,
      required: field.required ?? true,
      defaultValue: field.default_value ?? null,
      minLength: field.min_length ?? null,
      maxLength: field.max_length ?? null,
      minValue: field.min_value ?? null,
      maxValue: field.max_value ?? null,
      pattern: field.pattern ?? null,
      choices: field.choices ?? null,
      generationHint: field.faker_provider ?? null,
      validator: field.validator ?? null,
      description: field.description ?? "",
    })),
  });
}

export function serializeSchema(
  schema: SchemaDefinition,
  format: SchemaFormat = "json",
): string {
  const document = toDocument(schema);
  return format === "yaml"
    ? stringifyYaml(document)
    : JSON.stringify(document, null, 2);
}

/**
 * @throws SchemaDefinitionError on unparseable text or an invalid document
 */
export function parseSchema(
  text: string,
  format: SchemaFormat = "json",
): SchemaDefinition {
  let document: unknown;
  try {
    document = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new SchemaDefinitionError(
      `Failed to parse ${format} schema document`,
      undefined,
      { cause: error },
    );
  }
  return fromDocument(document);
}

export function schemaFormatFor(filePath: string): SchemaFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === ".yaml" || extension === ".yml") return "yaml";
  if (extension === ".json") return "json";
  throw new PersistenceError(
    `Unsupported schema file format: ${filePath}. Must be .json, .yaml, or .yml`,
  );
}

/**
 * Load a schema from a JSON or YAML file
 */
export async function loadSchemaFile(filePath: string): Promise<SchemaDefinition> {
  const format = schemaFormatFor(filePath);
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new PersistenceError(`Failed to read schema from ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const schema = parseSchema(content, format);
  logger.info("Loaded schema", { filePath, name: schema.name, fields: schema.fields.length });
  return schema;
}

/**
 * Save a schema to a JSON or YAML file
 */
export async function saveSchemaFile(
  schema: SchemaDefinition,
  filePath: string,
): Promise<void> {
  const content = serializeSchema(schema, schemaFormatFor(filePath));
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new PersistenceError(`Failed to save schema to ${filePath}`, { filePath }, {
      cause: error,
    });
  }
  logger.info("Saved schema", { filePath, name: schema.name });
}
