/**
 * CLI Commands Index
 */

export { login, type LoginOptions, type CredentialsSource } from './login.js';
export { postMessage, type PostOptions } from './post.js';
export { showStatus } from './status.js';
export { logout } from './logout.js';
