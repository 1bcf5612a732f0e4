import { StepLineError } from '@stepline/core';

export class FlowDefinitionError extends StepLineError {
    constructor(public readonly issues: string[]) {
        super(`Invalid flow definition: ${issues.join('; ')}`);
        this.name = 'FlowDefinitionError';
    }
}

export class UnknownStepError extends StepLineError {
    constructor(
        public readonly step: string,
        public readonly available: string[]
    ) {
        super(`Step '${step}' not found in available steps [${available.join(', ')}]`);
        this.name = 'UnknownStepError';
    }
}
