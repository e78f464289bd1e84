import { startArchiver } from "../composition/root";
import { buildCliErrorEnvelope, isDebugMode } from "./archive";

export const executeServeCli = async (): Promise<void> => {
  try {
    await startArchiver();
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode(), "server.failed");
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeServeCli();
}
