export { BaseGraphQLProvider } from "./base.js";
export type { ProviderOptions } from "./base.js";
export { BraintreeProvider, createBraintreeProvider } from "./braintree.js";
export type { BraintreeProviderOpts } from "./braintree.js";
