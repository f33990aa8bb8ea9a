import { ValidationError } from '../errors.js';
import type { FieldViolation } from '../errors.js';
import type { AttributeDefinitionInput } from './types.js';

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

export function validateDefinitionInvariants(definition: Partial<AttributeDefinitionInput>): FieldViolation[] {
  const violations: FieldViolation[] = [];

  if (isBlank(definition.name)) {
    violations.push({ field: 'name', message: 'Name cannot be empty' });
  }

  if (isBlank(definition.extractionPrompt)) {
    violations.push({ field: 'extractionPrompt', message: 'Extraction prompt cannot be empty' });
  }

  if (isBlank(definition.judgmentPrompt)) {
    violations.push({ field: 'judgmentPrompt', message: 'Judgment prompt cannot be empty' });
  }

  return violations;
}

export function validateValueInvariants(value: { content?: string }): FieldViolation[] {
  if (isBlank(value.content)) {
    return [{ field: 'content', message: 'Content cannot be empty' }];
  }
  return [];
}

export function assertValidDefinition(definition: Partial<AttributeDefinitionInput>): void {
  const violations = validateDefinitionInvariants(definition);
  if (violations.length > 0) {
    throw new ValidationError(violations);
  }
}

export function assertValidValueContent(content: string): void {
  const violations = validateValueInvariants({ content });
  if (violations.length > 0) {
    throw new ValidationError(violations);
  }
}
