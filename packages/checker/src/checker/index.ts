/**
 * Compatibility checker - Public API
 */

export {
  createCheck,
  runCheck,
  checkCall,
  isFailed,
  type CheckState,
  type CheckVerdict,
  type PendingCheck,
  type PassedCheck,
  type FailedCheck,
} from "./compatibility.js";
export {
  checkSite,
  type SiteReport,
  type SiteContext,
} from "./sites.js";
export { verifyDeclaredInterfaces } from "./interfaces.js";
