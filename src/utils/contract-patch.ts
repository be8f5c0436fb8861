import {
    CONTRACT_OPTIONAL_FIELDS,
    ContractChanges,
    ContractOptionalField,
    ContractPayload,
    FORM_STAGES,
    FormStage,
    NewContract
} from "@/contracts/interfaces/contract.interface";
import { parse_date_input, parse_time_input } from "@/utils/dates";
import { ResponseError } from "@/utils/errors";

const TIME_FIELDS: ContractOptionalField[] = ["start_at_time", "end_at_time"];

const is_form_stage = (value: unknown): value is FormStage =>
    FORM_STAGES.some((stage) => stage === value);

const is_optional_field = (value: unknown): value is ContractOptionalField =>
    CONTRACT_OPTIONAL_FIELDS.some((field) => field === value);

const parse_field = (field: ContractOptionalField, value: unknown): string => {
    if (typeof value !== "string") throw new ResponseError(400, `${field} debe ser un texto`);

    if (field === "date") {
        const parsed = parse_date_input(value);
        if (!parsed) throw new ResponseError(400, `date no es una fecha válida: ${value}`);
        return parsed;
    }

    if (TIME_FIELDS.includes(field)) {
        const parsed = parse_time_input(value);
        if (!parsed) throw new ResponseError(400, `${field} no es una hora válida: ${value}`);
        return parsed;
    }

    return value;
};

const parse_form_stage = (value: unknown): FormStage | undefined => {
    if (value === undefined || value === null || value === "") return undefined;
    if (!is_form_stage(value)) {
        throw new ResponseError(400, `form_stage debe ser uno de: ${FORM_STAGES.join(", ")}`);
    }
    return value;
};

const parse_assignments = (payload: ContractPayload): Partial<Record<ContractOptionalField, string>> => {
    const assignments: Partial<Record<ContractOptionalField, string>> = {};

    for (const field of CONTRACT_OPTIONAL_FIELDS) {
        const value = payload[field];
        // null, "" y ausente significan "no tocar"
        if (value === undefined || value === null || value === "") continue;
        assignments[field] = parse_field(field, value);
    }

    return assignments;
};

const parse_clear_fields = (value: unknown): ContractOptionalField[] => {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) throw new ResponseError(400, "clear_fields debe ser una lista");

    const fields: ContractOptionalField[] = [];
    for (const item of value) {
        if (!is_optional_field(item)) {
            throw new ResponseError(400, `clear_fields contiene un campo no permitido: ${String(item)}`);
        }
        if (!fields.includes(item)) fields.push(item);
    }
    return fields;
};

/**
 * Arma el registro a insertar a partir del cuerpo recibido.
 * form_stage por defecto: project_id.
 */
export const build_new_contract = (user_id: string, payload: ContractPayload): NewContract => {
    if (!user_id) throw new ResponseError(400, "user_id es requerido");

    return {
        user_id,
        form_stage: parse_form_stage(payload.form_stage) ?? "project_id",
        ...parse_assignments(payload)
    };
};

/**
 * Valida una actualización parcial completa antes de escribir nada.
 */
export const build_contract_changes = (payload: ContractPayload): ContractChanges => {
    const set: ContractChanges["set"] = parse_assignments(payload);
    const form_stage = parse_form_stage(payload.form_stage);
    if (form_stage) set.form_stage = form_stage;

    const unset = parse_clear_fields(payload.clear_fields);
    const conflict = unset.find((field) => set[field] !== undefined);
    if (conflict) throw new ResponseError(400, `${conflict} no se puede asignar y limpiar a la vez`);

    return { set, unset };
};

export const is_empty_change = ({ set, unset }: ContractChanges): boolean =>
    Object.keys(set).length === 0 && unset.length === 0;
