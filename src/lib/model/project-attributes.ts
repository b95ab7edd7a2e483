/**
 * Project attribute maintenance: defining the custom attributes plan sync
 * depends on, and writing the values collected by the attribute form.
 */

import { ATTRIBUTE, CUSTOM_ATTRIBUTES, type DesignModel, type WritableDesignModel } from './design-model';

export interface EnsureAttributesResult {
    added: string[];
    existing: string[];
}

/**
 * Define each attribute the model lacks. Existing ones keep their values.
 */
export function ensureProjectAttributes(
    model: WritableDesignModel,
    names: readonly string[] = CUSTOM_ATTRIBUTES
): EnsureAttributesResult {
    const result: EnsureAttributesResult = { added: [], existing: [] };

    for (const name of names) {
        if (model.hasAttribute(name)) {
            result.existing.push(name);
        } else {
            model.defineAttribute(name);
            result.added.push(name);
        }
    }

    return result;
}

// The six values collected by the project attribute form
export interface ProjectAttributeValues {
    planName: string;
    specLevel: string;
    clientName: string;
    clientDivision: string;
    clientSubdivision: string;
    garageLoading: string;
}

export type ProjectAttributeField = keyof ProjectAttributeValues;

export const PROJECT_ATTRIBUTE_FIELDS: ReadonlyArray<{ field: ProjectAttributeField; attribute: string; label: string }> = [
    { field: 'planName', attribute: ATTRIBUTE.projectName, label: 'Plan Name' },
    { field: 'specLevel', attribute: ATTRIBUTE.specLevel, label: 'Spec Level' },
    { field: 'clientName', attribute: ATTRIBUTE.clientName, label: 'Client Name' },
    { field: 'clientDivision', attribute: ATTRIBUTE.clientDivision, label: 'Client Division' },
    { field: 'clientSubdivision', attribute: ATTRIBUTE.clientSubdivision, label: 'Client Subdivision' },
    { field: 'garageLoading', attribute: ATTRIBUTE.garageLoading, label: 'Garage Loading' },
];

export function readProjectAttributes(model: DesignModel): ProjectAttributeValues {
    const values: ProjectAttributeValues = {
        planName: '',
        specLevel: '',
        clientName: '',
        clientDivision: '',
        clientSubdivision: '',
        garageLoading: ''
    };
    for (const { field, attribute } of PROJECT_ATTRIBUTE_FIELDS) {
        values[field] = model.getAttribute(attribute);
    }
    return values;
}

/**
 * Labels of blank form fields. The form requires all six, garage loading included.
 */
export function validateProjectAttributes(values: ProjectAttributeValues): string[] {
    return PROJECT_ATTRIBUTE_FIELDS.filter(({ field }) => values[field].trim() === '').map(({ label }) => label);
}

export interface ApplyAttributesResult {
    written: string[];
    notInModel: string[];
}

/**
 * Write trimmed values to the model. Attributes the model doesn't define are
 * skipped and reported back rather than created.
 */
export function applyProjectAttributes(model: WritableDesignModel, values: ProjectAttributeValues): ApplyAttributesResult {
    const result: ApplyAttributesResult = { written: [], notInModel: [] };

    for (const { field, attribute } of PROJECT_ATTRIBUTE_FIELDS) {
        if (model.setAttribute(attribute, values[field].trim())) {
            result.written.push(attribute);
        } else {
            result.notInModel.push(attribute);
        }
    }

    return result;
}
