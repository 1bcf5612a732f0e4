import { z } from 'zod';
import { FailureStrategy, Task, Workflow } from '@stepline/core';
import { describeWorkflow, functionName, toFunctionSchema } from '../src';

const fulfilment = new Workflow(
    'Order Fulfilment',
    [
        new Task({ name: 'reserve', run: () => undefined, description: 'Reserve stock' }),
        new Task({ name: 'ship', run: () => undefined }),
    ],
    FailureStrategy.COMPENSATE,
    'Ships a paid order'
);

describe('describeWorkflow', () => {
    it('lists the steps with their descriptions', () => {
        expect(describeWorkflow(fulfilment)).toEqual({
            name: 'Order Fulfilment',
            description: 'Ships a paid order',
            strategy: FailureStrategy.COMPENSATE,
            steps: [
                { name: 'reserve', description: 'Reserve stock' },
                { name: 'ship', description: 'No description provided.' },
            ],
        });
    });

    it('fills in a missing workflow description', () => {
        expect(describeWorkflow(new Workflow('bare', [])).description).toBe('No description provided.');
    });
});

describe('functionName', () => {
    it('snake-cases the workflow name', () => {
        expect(functionName('Order Fulfilment')).toBe('run_order_fulfilment');
        expect(functionName('data-sync  job')).toBe('run_data_sync_job');
    });
});

describe('toFunctionSchema', () => {
    it('describes initial_data with the JSON schema of the data', () => {
        const schema = toFunctionSchema(describeWorkflow(fulfilment), z.object({ orderId: z.string() }));

        expect(schema.name).toBe('run_order_fulfilment');
        expect(schema.description).toBe('Ships a paid order');
        expect(schema.parameters.type).toBe('object');
        expect(schema.parameters.required).toEqual(['initial_data']);
        expect(schema.parameters.properties.initial_data).toMatchObject({
            type: 'object',
            properties: { orderId: { type: 'string' } },
            required: ['orderId'],
        });
    });
});
