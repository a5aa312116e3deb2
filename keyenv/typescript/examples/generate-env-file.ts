/**
 * Writes a project environment's secrets to a .env file
 *
 * ## Usage
 *
 * ```bash
 * export KEYENV_TOKEN=your-service-token
 * export KEYENV_PROJECT=proj_123
 * npx tsx examples/generate-env-file.ts production
 * ```
 */

import { writeFile } from 'node:fs/promises';
import { createClientFromEnv, ConsoleLogger, NotFoundError, AuthenticationError } from '../src/index.js';

async function main(): Promise<void> {
  const projectId = process.env['KEYENV_PROJECT'];
  const environment = process.argv[2] ?? 'development';

  if (!projectId) {
    console.error('KEYENV_PROJECT is not set');
    process.exitCode = 1;
    return;
  }

  const client = createClientFromEnv({ logger: new ConsoleLogger({ level: 'debug' }) });

  try {
    const environments = await client.listEnvironments(projectId);
    console.log(`Environments: ${environments.map((env) => env.name).join(', ')}`);

    const content = await client.generateEnvFile(projectId, environment);
    await writeFile('.env', content, { mode: 0o600 });
    console.log(`Wrote .env for ${environment}`);
  } catch (error) {
    if (error instanceof AuthenticationError) {
      console.error('Token was rejected:', error.message);
    } else if (error instanceof NotFoundError) {
      console.error('Project or environment not found:', error.message);
    } else {
      throw error;
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
