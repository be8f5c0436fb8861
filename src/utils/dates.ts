import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

dayjs.extend(customParseFormat);

// Fecha pura o fecha-hora ISO (T o espacio como separador, zona opcional)
const DATE_TIME_REGEX = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?)(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const TIME_REGEX = /^(\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?)(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Normaliza `HH:mm`, `HH:mm:ss` o `HH:mm:ss.ffffff` a `HH:mm:ss`.
 * Las fracciones de segundo se descartan.
 */
const normalize_time = (value: string): string | null => {
    const [hours, minutes, seconds = "00"] = value.split(".")[0].split(":");
    const normalized = `${hours}:${minutes}:${seconds}`;
    return dayjs(normalized, "HH:mm:ss", true).isValid() ? normalized : null;
};

/**
 * Interpreta una fecha de calendario. Acepta `YYYY-MM-DD` o una fecha-hora
 * completa, en cuyo caso solo se toma la parte de la fecha tal como viene
 * escrita (sin convertir zona horaria).
 *
 * @returns `YYYY-MM-DD` o `null` si el valor no es una fecha válida
 */
export const parse_date_input = (value: string): string | null => {
    const match = DATE_TIME_REGEX.exec(value.trim());
    if (!match) return null;

    const [, date, time] = match;
    if (!dayjs(date, "YYYY-MM-DD", true).isValid()) return null;
    if (time !== undefined && normalize_time(time) === null) return null;

    return date;
};

/**
 * Interpreta una hora del día. Acepta `HH:mm[:ss]` o una fecha-hora completa,
 * de la que se extrae la hora. Una fecha sin hora equivale a medianoche.
 *
 * @returns `HH:mm:ss` o `null` si el valor no es una hora válida
 */
export const parse_time_input = (value: string): string | null => {
    const trimmed = value.trim();

    const time_match = TIME_REGEX.exec(trimmed);
    if (time_match) return normalize_time(time_match[1]);

    const date_time_match = DATE_TIME_REGEX.exec(trimmed);
    if (!date_time_match) return null;

    const [, date, time] = date_time_match;
    if (!dayjs(date, "YYYY-MM-DD", true).isValid()) return null;
    return time === undefined ? "00:00:00" : normalize_time(time);
};

/**
 * "January 21, 2026 at 2:30 PM", "January 21, 2026" o null sin fecha.
 */
export const format_contract_datetime = (date?: string | null, time?: string | null): string | null => {
    if (!date) return null;

    const date_str = dayjs(date, "YYYY-MM-DD").format("MMMM DD, YYYY");
    if (!time) return date_str;

    const time_str = dayjs(`${date} ${time}`, "YYYY-MM-DD HH:mm:ss").format("h:mm A");
    return `${date_str} at ${time_str}`;
};
