/**
 * Environment snapshot.
 *
 * Agents never read process.env directly; the caller builds one AgentEnv at
 * startup and passes it in, so command construction can be tested without
 * touching real process state.
 */

export type AgentEnv = Readonly<Record<string, string>>;

/** Snapshot the non-empty string variables of an environment. */
export function readAgentEnv(source: NodeJS.ProcessEnv | Record<string, string | undefined>): AgentEnv {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' && value.length > 0) {
      out[key] = value;
    }
  }
  return Object.freeze(out);
}

/** Copy the listed variables that are present into `target`. Existing entries are kept. */
export function forwardEnv(
  env: AgentEnv,
  keys: readonly string[],
  target: Record<string, string>
): Record<string, string> {
  for (const key of keys) {
    if (key in target) continue;
    const value = env[key];
    if (value) target[key] = value;
  }
  return target;
}

/** First present variable among `keys`, as a [name, value] pair. */
export function firstPresent(env: AgentEnv, keys: readonly string[]): [string, string] | null {
  for (const key of keys) {
    const value = env[key];
    if (value) return [key, value];
  }
  return null;
}

export function envOrUndefined(env: Record<string, string>): Record<string, string> | undefined {
  return Object.keys(env).length > 0 ? env : undefined;
}
