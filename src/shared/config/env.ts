export type Env = {
  CT_LOG_URI: string;
  MONGO_URI: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const rawLogUri = env.CT_LOG_URI?.trim();
  if (!rawLogUri) {
    throw new Error("CT_LOG_URI must be set to the base URL of a CT log");
  }

  const CT_LOG_URI = validateHttpUrl("CT_LOG_URI", rawLogUri);
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/ctscan";

  return { CT_LOG_URI, MONGO_URI };
};
