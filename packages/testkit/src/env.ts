/**
 * Run `fn` with one environment variable set (or removed when `value` is
 * undefined), restoring the previous state afterwards.
 */
export function withEnv<T>(name: string, value: string | undefined, fn: () => T): T {
  const env = process.env;
  const had = Object.prototype.hasOwnProperty.call(env, name);
  const prev = env[name];
  try {
    if (value === undefined) {
      Reflect.deleteProperty(env, name);
    } else {
      env[name] = value;
    }
    return fn();
  } finally {
    if (had && prev !== undefined) {
      env[name] = prev;
    } else {
      Reflect.deleteProperty(env, name);
    }
  }
}
