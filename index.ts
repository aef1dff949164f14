"use strict";

// Barrel exports for the public API

export * from "./src/index";

// Default export for CommonJS consumers
import { SubscriberSessionManager as _ManagerDefault } from "./src/ts/api/SubscriberSessionManager";
export default _ManagerDefault;
