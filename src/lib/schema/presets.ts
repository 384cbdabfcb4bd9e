/**
 * Predefined schemas for common test fixtures
 */

import { SchemaDefinition } from "./schema-definition.js";

export function createUserSchema(): SchemaDefinition {
  return new SchemaDefinition({
    name: "user",
    description: "User account records",
    version: "1.0",
    fields: [
      { name: "id", dataType: "uuid", generationHint: "uuid4" },
      {
        name: "username",
        dataType: "string",
        minLength: 3,
        maxLength: 20,
        generationHint: "user_name",
      },
      { name: "email", dataType: "email", generationHint: "email", validator: "email" },
      { name: "password", dataType: "string", minLength: 8, maxLength: 50 },
      { name: "first_name", dataType: "string", generationHint: "first_name" },
      { name: "last_name", dataType: "string", generationHint: "last_name" },
      { name: "phone", dataType: "phone", generationHint: "phone_number" },
      { name: "age", dataType: "integer", minValue: 18, maxValue: 100 },
      { name: "is_active", dataType: "boolean" },
      { name: "role", dataType: "string", choices: ["user", "admin", "moderator"] },
      {
        name: "created_at",
        dataType: "datetime",
        generationHint: "date_time_this_year",
      },
    ],
  });
}

export function createProductSchema(): SchemaDefinition {
  return new SchemaDefinition({
    name: "product",
    description: "Catalog product records",
    version: "1.0",
    fields: [
      { name: "id", dataType: "uuid", generationHint: "uuid4" },
      {
        name: "name",
        dataType: "string",
        minLength: 5,
        maxLength: 100,
        generationHint: "catch_phrase",
      },
      {
        name: "description",
        dataType: "string",
        maxLength: 500,
        generationHint: "text",
      },
      { name: "price", dataType: "float", minValue: 0.01, maxValue: 9999.99 },
      {
        name: "category",
        dataType: "string",
        choices: ["electronics", "clothing", "home", "books", "sports", "beauty"],
      },
      { name: "stock", dataType: "integer", minValue: 0, maxValue: 1000 },
      { name: "sku", dataType: "string", generationHint: "ean13" },
      { name: "brand", dataType: "string", generationHint: "company" },
      { name: "is_available", dataType: "boolean" },
      {
        name: "created_at",
        dataType: "datetime",
        generationHint: "date_time_this_year",
      },
    ],
  });
}
