/**
 * Schema Validator - JSON schema subset used for device registry documents.
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType;
    properties?: Record<string, JsonSchema>;
    /** Schema applied to every key not listed in `properties` */
    additionalProperties?: JsonSchema | false;
    required?: string[];
    items?: JsonSchema;
    enum?: ReadonlyArray<string | number>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minItems?: number;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const actualType = this.getType(value);
        if (actualType !== schema.type) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            const known = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = known[key];
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                } else if (schema.additionalProperties === false) {
                    errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                } else if (schema.additionalProperties) {
                    this.validateValue(child, schema.additionalProperties, `${path}.${key}`, errors);
                }
            }
        }

        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s)` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum && (typeof value === 'string' || typeof value === 'number') && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (!Number.isFinite(value)) {
                errors.push({ path, message: 'Value must be finite' });
            }
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
