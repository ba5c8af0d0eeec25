// Debug loggers.
//
// Output is off unless the DEBUG environment variable matches, e.g.
// DEBUG=parcelkit:* or DEBUG=parcelkit:registry.

import createDebug from "debug";

export const NAMESPACE = "parcelkit";

export const log = {
  registry: createDebug(`${NAMESPACE}:registry`),
  bundle: createDebug(`${NAMESPACE}:bundle`),
};
