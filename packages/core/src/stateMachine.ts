export type ExecutorPhase = 'idle' | 'loading' | 'running' | 'persisting' | 'terminated' | 'failed';

const validPhaseTransitions: Record<ExecutorPhase, ExecutorPhase[]> = {
  idle: ['loading'],
  loading: ['running', 'terminated', 'failed'],
  running: ['persisting', 'terminated', 'failed'],
  persisting: ['running', 'terminated', 'failed'],
  terminated: [],
  failed: [],
};

export function canTransitionPhase(from: ExecutorPhase, to: ExecutorPhase): boolean {
  return validPhaseTransitions[from].includes(to);
}

export function transitionPhase(current: ExecutorPhase, next: ExecutorPhase): ExecutorPhase {
  if (!canTransitionPhase(current, next)) {
    throw new Error(`Invalid executor phase transition: ${current} -> ${next}`);
  }
  return next;
}

export function isPhaseTerminal(phase: ExecutorPhase): boolean {
  return validPhaseTransitions[phase].length === 0;
}
