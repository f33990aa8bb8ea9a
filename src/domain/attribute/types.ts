/**
 * Attribute Domain Types
 */

export interface IAttributeDefinition {
  id: number;
  name: string;
  /** Prompt fragment describing what to pull out of a user message */
  extractionPrompt: string;
  /** Prompt fragment asking whether this category is needed to answer */
  judgmentPrompt: string;
}

export type AttributeDefinitionInput = Omit<IAttributeDefinition, 'id'>;

export interface IAttributeValue {
  sequenceNo: number;
  attributeId: number;
  content: string;
  createdAt: number;
  updatedAt: number;
}

/**
 * Narrow store contract consumed by the turn pipeline.
 */
export interface IAttributeStore {
  /** All definitions, ascending by identifier */
  listDefinitions(): IAttributeDefinition[];
  latestValue(definitionId: number): IAttributeValue | null;
  insertValue(definitionId: number, content: string): number;
}

/**
 * Administrative operations on top of the pipeline contract.
 */
export interface IAttributeRepository extends IAttributeStore {
  createDefinition(input: AttributeDefinitionInput): IAttributeDefinition;
  getDefinition(id: number): IAttributeDefinition | null;
  updateDefinition(definition: IAttributeDefinition): boolean;
  deleteDefinition(id: number): boolean;

  listValues(definitionId?: number): IAttributeValue[];
  getValue(sequenceNo: number): IAttributeValue | null;
  updateValue(sequenceNo: number, content: string): boolean;
  deleteValue(sequenceNo: number): boolean;
}
