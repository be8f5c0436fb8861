import * as XLSX from "xlsx";
import { NewAgency, NewZipProfile } from "@/contracts/interfaces/contractor.interface";

type Row = Record<string, unknown>;

/**
 * Filas de la primera hoja del libro, con celdas vacías como null.
 */
export const read_first_sheet = (workbook: XLSX.WorkBook): Row[] => {
    const [sheet_name] = workbook.SheetNames;
    if (!sheet_name) return [];
    return XLSX.utils.sheet_to_json<Row>(workbook.Sheets[sheet_name], { defval: null });
};

const is_empty = (value: unknown): boolean =>
    value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));

export const cell_to_string = (value: unknown): string => (is_empty(value) ? "" : String(value));

export const yes_no_to_bool = (value: unknown): boolean =>
    !is_empty(value) && String(value).trim().toUpperCase() === "YES";

// "NEW YORK" → "New York", "st. louis" → "St. Louis"
export const title_case = (value: string): string =>
    value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, prefix: string, letter: string) => prefix + letter.toUpperCase());

export const pad_zip_code = (value: unknown): string => cell_to_string(value).trim().padStart(5, "0");

export const parse_agency_rows = (rows: Row[]): NewAgency[] =>
    rows.map((row) => ({
        code: cell_to_string(row.agency_code).trim(),
        name: cell_to_string(row.agency_name),
        phone: cell_to_string(row.phone),
        website: cell_to_string(row.website),
        to_apply_url: cell_to_string(row.to_apply),
        notes: cell_to_string(row.notes),
    }));

export const parse_zip_profile_rows = (rows: Row[]): NewZipProfile[] =>
    rows.map((row) => ({
        zip_code: pad_zip_code(row.zip_code),
        city: title_case(cell_to_string(row.city)),
        fuel_type: cell_to_string(row.fuel_type),
        sponsored: cell_to_string(row.sponsored),
        utility_type: cell_to_string(row.utility_type),
        has_utility: yes_no_to_bool(row.utility),
        proceed_reason: cell_to_string(row.proceed_reason),
        is_dec: yes_no_to_bool(row.is_dec),
        electrification_candidate: yes_no_to_bool(row.electrification_candidate),
        agency_code: is_empty(row.R2_AgencyCodes) ? null : String(row.R2_AgencyCodes),
    }));
