import { readFileSync } from "node:fs";
import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import type { Role } from "../utils/types.js";
import { registryFileSchema } from "./schema.js";
import type { RegistryEntry, ToolPropertySchema } from "./types.js";

type ArgumentValidator = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

// Models often send numbers as strings ("6"); accept those, reject anything else.
function numeric(schema: z.ZodNumber): z.ZodTypeAny {
  return z.preprocess(
    (value) => (typeof value === "string" && NUMERIC_STRING.test(value.trim()) ? Number(value) : value),
    schema,
  );
}

function compileProperty(property: ToolPropertySchema): z.ZodTypeAny {
  switch (property.type) {
    case "string": {
      if (property.enum) {
        const [first, ...rest] = property.enum;
        return z.enum([first, ...rest]);
      }
      let schema = z.string().min(1);
      if (property.pattern) schema = schema.regex(new RegExp(property.pattern));
      return schema;
    }
    case "integer":
    case "number": {
      let schema = property.type === "integer" ? z.number().int() : z.number();
      if (property.minimum !== undefined) schema = schema.min(property.minimum);
      if (property.maximum !== undefined) schema = schema.max(property.maximum);
      return numeric(schema);
    }
    case "boolean":
      return z.boolean();
  }
}

function compileValidator(entry: RegistryEntry): ArgumentValidator {
  const shape: Record<string, z.ZodTypeAny> = {};
  const required = new Set(entry.inputSchema.required);

  for (const [name, property] of Object.entries(entry.inputSchema.properties)) {
    const schema = compileProperty(property);
    if (property.default !== undefined) {
      shape[name] = schema.default(property.default);
    } else if (required.has(name)) {
      shape[name] = schema;
    } else {
      shape[name] = schema.optional();
    }
  }

  return z.object(shape).strict();
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * The closed set of tools the agent may call. Loaded once at startup and
 * read-only afterwards.
 */
export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, RegistryEntry>;
  private readonly validators: ReadonlyMap<string, ArgumentValidator>;

  constructor(entries: readonly RegistryEntry[]) {
    const byName = new Map<string, RegistryEntry>();
    const validators = new Map<string, ArgumentValidator>();

    for (const entry of entries) {
      if (byName.has(entry.name)) {
        throw new Error(`Duplicate tool in registry: ${entry.name}`);
      }
      for (const name of entry.inputSchema.required) {
        if (!(name in entry.inputSchema.properties)) {
          throw new Error(`Tool ${entry.name} requires undeclared argument: ${name}`);
        }
      }
      byName.set(entry.name, Object.freeze(entry));
      validators.set(entry.name, compileValidator(entry));
    }

    this.entries = byName;
    this.validators = validators;
  }

  static parse(raw: unknown): ToolRegistry {
    return new ToolRegistry(registryFileSchema.parse(raw).tools);
  }

  static load(path: string): ToolRegistry {
    return ToolRegistry.parse(JSON.parse(readFileSync(path, "utf-8")) as unknown);
  }

  get(name: string): RegistryEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): RegistryEntry[] {
    return [...this.entries.values()];
  }

  /** Tools whose role restriction admits `role`. */
  visibleTo(role: Role): RegistryEntry[] {
    return this.list().filter((entry) => !entry.allowedRoles || entry.allowedRoles.includes(role));
  }

  /** Type-checks arguments against the declared input schema and fills defaults. */
  validate(name: string, args: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const validator = this.validators.get(name);
    if (!validator) {
      throw InvalidArgumentError.forTool(name, ["tool is not registered"]);
    }
    const parsed = validator.safeParse(args);
    if (!parsed.success) {
      throw InvalidArgumentError.forTool(name, formatIssues(parsed.error));
    }
    return parsed.data;
  }
}
