/**
 * skypost CLI building blocks, for embedding the commands elsewhere.
 */

export { createContext, type CliContext, type ContextOverrides } from './context.js';
export {
  ask,
  credentialsFromEnv,
  promptCredentials,
  createCredentialsProvider,
  createLoginCredentialsSource,
} from './prompt.js';
export * from './commands/index.js';
