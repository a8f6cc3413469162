/**
 * Tool descriptions and user-facing messages.
 *
 * Descriptions are what MCP clients (and the model reading the tool list) see,
 * so they carry the usage notes: the server itself never introspects the
 * schema or checks a query before sending it.
 */

export const PING_DESCRIPTION =
    "Performs a simple ping query to the Braintree GraphQL API to check connectivity and authentication. " +
    "Returns 'pong' on success, or an error message.";

export const EXECUTE_GRAPHQL_DESCRIPTION = `Executes an arbitrary GraphQL query or mutation against the Braintree API.
Returns the complete JSON response from Braintree, including \`data\` and \`errors\`, without modification.

The schema can be explored with standard introspection, for example:

  query TypeQuery { __type(name: "Transaction") { name fields { name type { name kind } } } }

Convert a legacy ID before querying by node:

  query IdFromLegacyId($legacyId: ID!, $type: LegacyIdType!) { idFromLegacyId(legacyId: $legacyId, type: $type) }
  variables: {"legacyId": "123456", "type": "CUSTOMER"}

Charge a vaulted payment method:

  mutation ChargePayment($input: ChargePaymentMethodInput!) {
    chargePaymentMethod(input: $input) { transaction { id status amount { value currencyCode } } }
  }
  variables: {"input": {"paymentMethodId": "<id>", "transaction": {"amount": "10.00"}}}

Paginated searches return pageInfo { hasNextPage endCursor }; pass endCursor back as \`after\`.
Always check the "errors" array in the response: GraphQL errors are passed through, not raised.`;

export const ID_FROM_LEGACY_ID_DESCRIPTION =
    "Retrieves the Braintree GraphQL ID corresponding to a given legacy ID and its type.";

export const LEGACY_ID_TYPES = [
    "TRANSACTION",
    "CUSTOMER",
    "PAYMENT_METHOD",
    "SUBSCRIPTION",
    "DISPUTE",
] as const;

export function pingErrorMessage(reason: string): string {
    return `Error pinging Braintree: ${reason}`;
}

export function executeErrorMessage(reason: string): string {
    return `Error executing GraphQL: ${reason}`;
}

export function legacyIdErrorMessage(reason: string): string {
    return `Error retrieving GraphQL ID: ${reason}`;
}

export function legacyIdNotFoundMessage(legacyId: string, legacyIdType: string): string {
    return `No GraphQL ID found for legacy ID '${legacyId}' of type '${legacyIdType}'.`;
}

export function unexpectedResponseMessage(context: string, rendered: string): string {
    return `Unexpected response from Braintree ${context}: ${rendered}`;
}
