export {
  generateSessionId,
  generateOrderId,
  resolveIdentity,
  systemIdentity,
  type IdentitySource,
} from './ids.js';
export { appendHistory, recentHistory } from './history.js';
