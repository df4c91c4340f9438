import type { DatasetStatus, HealthResponse } from "../../types";
import { readStoreSnapshot } from "../order/OrderService";
import { ErrorCodes, VoiceAgentError } from "../../utils/error";

export class HealthService {
  constructor(private readonly dataPath: string) {}

  async check(): Promise<HealthResponse> {
    const [database, message] = await this.verifyStaticDataset();
    return {
      status: database === "static-json" ? "healthy" : "unhealthy",
      database,
      message,
    };
  }

  private async verifyStaticDataset(): Promise<[DatasetStatus, string]> {
    try {
      await readStoreSnapshot(this.dataPath);
      return ["static-json", "Static dataset loaded successfully"];
    } catch (error) {
      if (
        error instanceof VoiceAgentError &&
        error.code === ErrorCodes.ORDER_DATA_MISSING
      ) {
        return ["missing", "Static dataset not found"];
      }
      if (
        error instanceof VoiceAgentError &&
        error.code === ErrorCodes.ORDER_DATA_INVALID
      ) {
        return ["invalid", "Static dataset is malformed"];
      }
      throw error;
    }
  }
}
