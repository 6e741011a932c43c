import { compileGraph, END, START, type CompiledGraph } from '@stepwise/core';
import { makeLogger } from '@stepwise/shared';
import { z } from 'zod';

const logger = makeLogger('example-graph');

export const MAX_PROCESSING_STEPS = 3;

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const exampleStateSchema = z.object({
  messages: z.array(messageSchema),
  stepCount: z.number().int().nonnegative(),
  shouldContinue: z.boolean(),
});

export type ExampleMessage = z.infer<typeof messageSchema>;
export type ExampleState = z.infer<typeof exampleStateSchema>;

export function createExampleInitialState(prompt = 'Hello, start the workflow!'): ExampleState {
  return {
    messages: [{ role: 'user', content: prompt }],
    stepCount: 0,
    shouldContinue: true,
  };
}

function routeAfterWork(state: Readonly<ExampleState>): 'process' | 'output' {
  return state.shouldContinue ? 'process' : 'output';
}

/**
 * input -> process (repeats while `shouldContinue`) -> output. Each step
 * appends one message; processing stops after three counted steps.
 */
export function createExampleGraph(): CompiledGraph<ExampleState> {
  return compileGraph({
    name: 'example',
    stateSchema: exampleStateSchema,
    nodes: {
      input: state => {
        logger.debug('input received', { stepCount: state.stepCount });
        return {
          messages: [{ role: 'system', content: 'Input received and validated' }],
          stepCount: state.stepCount + 1,
          shouldContinue: true,
        };
      },
      process: state => {
        const step = state.stepCount + 1;
        logger.debug('processing', { step });
        return {
          messages: [{ role: 'assistant', content: `Processing complete (step ${step})` }],
          stepCount: step,
          shouldContinue: step < MAX_PROCESSING_STEPS,
        };
      },
      output: state => ({
        messages: [{ role: 'assistant', content: `Workflow complete after ${state.stepCount} steps` }],
      }),
    },
    edges: {
      [START]: 'input',
      input: { route: routeAfterWork, targets: ['process', 'output'] },
      process: { route: routeAfterWork, targets: ['process', 'output'] },
      output: END,
    },
    reducers: {
      messages: 'append',
    },
  });
}
