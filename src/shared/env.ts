/** Environment variables read by the CLI. Flags win over these; these win over the config file. */
export const ROLLCALL_ENV = {
  DATA_DIR: "ROLLCALL_DATA_DIR",
  DISCOVERY: "ROLLCALL_DISCOVERY",
  THRESHOLD: "ROLLCALL_THRESHOLD",
  LISTEN: "ROLLCALL_LISTEN",
} as const;

export function getEnv(key: keyof typeof ROLLCALL_ENV): string | undefined {
  const value = process.env[ROLLCALL_ENV[key]];
  return value === "" ? undefined : value;
}
