export class SettingsError extends Error {
  public override readonly name = "SettingsError";
  public readonly code = "INVALID_SETTING";

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}
