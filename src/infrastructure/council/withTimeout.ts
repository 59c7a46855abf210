import { GenerationFailure } from '../../domain/errors/CouncilErrors';

/**
 * Rejects with GenerationFailure when `task` does not settle within `timeoutMs`.
 * The timer is always cleared so no handle outlives the call.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string, agentId?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new GenerationFailure(`${label} timed out after ${timeoutMs}ms`, agentId));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
