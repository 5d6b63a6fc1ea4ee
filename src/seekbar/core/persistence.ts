import { z } from 'zod';
import type { RangeValues } from '../../types';
import type { RangeModel } from './RangeModel';

export const SavedRangeStateSchema = z.object({
    selectedMin: z.number().int(),
    selectedMax: z.number().int(),
});

export type SavedRangeState = z.infer<typeof SavedRangeStateSchema>;

export class RangeStateError extends Error {
    constructor(readonly issues: z.ZodIssue[]) {
        super(`Invalid saved range state: ${issues.map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`).join('; ')}`);
        this.name = 'RangeStateError';
    }
}

/**
 * Only the selected pair survives; bounds come back from construction and
 * interaction state is never saved.
 */
export function saveRangeState(model: RangeModel): SavedRangeState {
    return {
        selectedMin: model.getSelectedMin(),
        selectedMax: model.getSelectedMax(),
    };
}

export function parseRangeState(raw: unknown): RangeValues {
    const result = SavedRangeStateSchema.safeParse(raw);
    if (!result.success) {
        throw new RangeStateError(result.error.issues);
    }
    return result.data;
}
