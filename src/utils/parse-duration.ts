/**
 * Convert a free-text duration to an ISO 8601 duration (PT#H#M)
 *
 * Mela stores times as typed by the user: "30 min", "1 hour 15 minutes",
 * "1h30m", "45 Minuten". Values already in ISO form are upper-cased and kept.
 * Minutes past 60 are carried into hours. Text with no recognizable amount is
 * returned trimmed, since Mealie also accepts free text. Blank input gives undefined.
 *
 * @example
 * parseDuration("1 hour 30 minutes") // "PT1H30M"
 * parseDuration("90 min") // "PT1H30M"
 * parseDuration("45") // "PT45M"
 * parseDuration("overnight") // "overnight"
 * parseDuration("") // undefined
 */
export function parseDuration(raw: string | undefined): string | undefined {
  if (!raw || !raw.trim()) return undefined;

  const text = raw.trim().toLowerCase();

  if (text.startsWith("pt")) {
    return text.toUpperCase();
  }

  const hoursMatch = text.match(/(\d+)\s*(?:hours?|hrs?|h|stunden?)(?![a-z])/);
  const minutesMatch = text.match(/(\d+)\s*(?:minutes?|minuten|mins?|m)(?![a-z])/);

  let hours = hoursMatch ? parseInt(hoursMatch[1], 10) : 0;
  let minutes = minutesMatch ? parseInt(minutesMatch[1], 10) : 0;

  if (!hoursMatch && !minutesMatch) {
    const bare = text.match(/^(\d+)$/);
    if (!bare) return raw.trim();
    minutes = parseInt(bare[1], 10);
  }

  if (hours === 0 && minutes === 0) {
    return raw.trim();
  }

  hours += Math.floor(minutes / 60);
  minutes %= 60;

  let iso = "PT";
  if (hours) iso += `${hours}H`;
  if (minutes) iso += `${minutes}M`;
  return iso;
}
