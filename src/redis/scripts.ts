/**
 * Minimal surface needed to run Lua scripts. ioredis clients satisfy it; tests
 * pass in-process fakes.
 */
export interface ScriptRunner {
  script(subcommand: 'LOAD', script: string): Promise<unknown>;
  evalsha(sha: string, numKeys: number, ...keysAndArgs: string[]): Promise<unknown>;
  eval(script: string, numKeys: number, ...keysAndArgs: string[]): Promise<unknown>;
}

const loadedShas = new Map<string, string>();

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

/**
 * Runs a script by SHA, loading it on first use or after a NOSCRIPT reply.
 * Falls back to a plain EVAL when SCRIPT LOAD is unavailable.
 */
export async function evalScript(
  redis: ScriptRunner,
  script: string,
  keys: string[],
  args: string[],
): Promise<string> {
  const numKeys = keys.length;
  const cachedSha = loadedShas.get(script);

  if (cachedSha) {
    try {
      return String(await redis.evalsha(cachedSha, numKeys, ...keys, ...args));
    } catch (error) {
      if (!isNoScriptError(error)) {
        throw error;
      }
      loadedShas.delete(script);
    }
  }

  let sha: string;
  try {
    sha = String(await redis.script('LOAD', script));
  } catch {
    return String(await redis.eval(script, numKeys, ...keys, ...args));
  }

  loadedShas.set(script, sha);
  return String(await redis.evalsha(sha, numKeys, ...keys, ...args));
}

export function resetScriptCache(): void {
  loadedShas.clear();
}
