import { DefinitionKind, kindKeyword, type Schema } from "./schema";

/**
 * Prints a schema back to text. The output parses to an identical schema.
 */
export function prettyPrint(schema: Schema): string {
  let text = "";

  if (schema.package !== undefined) {
    text += `package ${schema.package};\n`;
  }

  schema.definitions.forEach((definition, i) => {
    if (i > 0 || schema.package !== undefined) {
      text += "\n";
    }
    text += `${kindKeyword(definition.kind)} ${definition.name} {\n`;

    for (const field of definition.fields) {
      text += "  ";
      if (definition.kind !== DefinitionKind.Enum) {
        text += `${field.type ?? ""}${field.isArray ? "[]" : ""} `;
      }
      text += field.name;
      if (definition.kind !== DefinitionKind.Struct) {
        text += ` = ${field.id}`;
      }
      if (field.isDeprecated) {
        text += " [deprecated]";
      }
      text += ";\n";
    }

    text += "}\n";
  });

  return text;
}
