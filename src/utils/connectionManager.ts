import type { SalesforceEnv } from "../types/connection.js";
import type { SalesforceClient } from "../types/salesforce.js";
import { connect, resolveCredentials, type SalesforceConnector } from "./connection.js";
import { ConnectionError, formatAuthenticationError, toToolFailure } from "./errorHandler.js";

type ConnectionState =
  | { status: "pending" }
  | { status: "connected"; client: SalesforceClient }
  | { status: "failed"; reason: string };

/**
 * Owns the Salesforce connection for the lifetime of the process. A failed
 * connect is recorded rather than thrown so the server keeps serving and
 * each tool call reports why it cannot reach Salesforce.
 */
export class ConnectionManager {
  private state: ConnectionState = { status: "pending" };

  constructor(private readonly connector: SalesforceConnector) {}

  /**
   * Resolve credentials and connect. Never throws.
   */
  async connect(env: SalesforceEnv): Promise<boolean> {
    try {
      const credentials = resolveCredentials(env);
      console.error(`Connecting to Salesforce using ${credentials.kind}...`);
      const client = await connect(credentials, this.connector);
      this.state = { status: "connected", client };
      console.error(`Salesforce connection established: ${client.instanceUrl}`);
      return true;
    } catch (error) {
      const failure = toToolFailure(error);
      const reason = failure.kind === "remote" ? formatAuthenticationError(error) : failure.message;
      this.state = { status: "failed", reason };
      console.error(`Salesforce connection failed: ${reason}`);
      return false;
    }
  }

  /**
   * Use an already-connected client
   */
  useClient(client: SalesforceClient): void {
    this.state = { status: "connected", client };
  }

  /**
   * The connected client, or a ConnectionError naming why there is none
   */
  getClient(): SalesforceClient {
    switch (this.state.status) {
      case "connected":
        return this.state.client;
      case "failed":
        throw new ConnectionError(
          `Salesforce connection not established: ${this.state.reason}`,
          "NOT_CONNECTED"
        );
      case "pending":
        throw new ConnectionError("Salesforce connection not established.", "NOT_CONNECTED");
    }
  }
}
