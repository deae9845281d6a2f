export { waitFor, waitForAll, resolveEscalation, type WaitOptions, type WaitAllOptions } from './waiter';
