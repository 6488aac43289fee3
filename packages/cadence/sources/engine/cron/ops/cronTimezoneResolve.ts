/**
 * Normalizes the scheduler timezone to its canonical IANA name.
 * Returns: "UTC" when no timezone is given; throws for identifiers Intl does not know.
 */
export function cronTimezoneResolve(timezone: string | null | undefined): string {
    const provided = timezone?.trim() ?? "";
    if (!provided) {
        return "UTC";
    }
    try {
        return new Intl.DateTimeFormat("en-US", { timeZone: provided }).resolvedOptions().timeZone;
    } catch (error) {
        throw new Error(`Invalid scheduler timezone: ${provided}`, { cause: error });
    }
}
