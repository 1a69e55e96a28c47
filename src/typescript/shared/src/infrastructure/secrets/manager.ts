/**
 * Reads a secret injected into the function's environment at deploy time.
 * @param secretName The name of the environment variable holding the secret.
 * @param env The environment to read from; the process environment unless given.
 * @throws Error if the variable is unset or empty.
 */
export function getSecret(secretName: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[secretName];

  if (!value) {
    throw new Error(`Secret ${secretName} not found in environment variables`);
  }

  return value;
}
