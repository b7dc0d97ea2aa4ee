import type { PicklistValue } from '../types/salesforce.js';

export interface FieldSummary {
  name: string;
  label: string;
  type: string;
  nillable: boolean;
  createable: boolean;
  updateable: boolean;
  length: number;
  picklistValues: PicklistValue[];
}

/**
 * Field summaries per object API name, filled on first describe. Entries are
 * only dropped through invalidate().
 */
export class FieldMetadataCache {
  private entries = new Map<string, FieldSummary[]>();

  get(objectName: string): FieldSummary[] | undefined {
    return this.entries.get(objectName);
  }

  set(objectName: string, fields: FieldSummary[]): void {
    this.entries.set(objectName, fields);
  }

  invalidate(objectName: string): boolean {
    return this.entries.delete(objectName);
  }
}
