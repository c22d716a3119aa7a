export { PageKeyboardDriver, isPressableKey } from './keyboard-driver.js';
export type { PageKeyboard } from './keyboard-driver.js';
export {
  PageIdentityProvider,
  CLOSED_PAGE_IDENTITY,
  createPageFocusGuard,
} from './identity-provider.js';
export type { IdentifiablePage } from './identity-provider.js';
