export const FORM_STAGES = ["project_id", "schedule", "documents", "closed"] as const;
export type FormStage = typeof FORM_STAGES[number];

// Campos opcionales del contrato que se pueden asignar o limpiar por separado
export const CONTRACT_OPTIONAL_FIELDS = [
    "zip",
    "city",
    "fuel_type",
    "external_project_id",
    "date",
    "start_at_time",
    "end_at_time",
    "meeting_url",
    "inspection_doc",
    "invoice_doc",
] as const;
export type ContractOptionalField = typeof CONTRACT_OPTIONAL_FIELDS[number];

export type ContractOptionalValues = Partial<Record<ContractOptionalField, string | null>>;

export interface Contract extends ContractOptionalValues {
    _id: string;
    user_id: string;

    // date: YYYY-MM-DD, start_at_time / end_at_time: HH:mm:ss
    form_stage: FormStage;

    created_at: Date;
    updated_at: Date;
}

export type NewContract = {
    user_id: string;
    form_stage: FormStage;
} & Partial<Record<ContractOptionalField, string>>;

/**
 * Cambios ya validados de una actualización parcial.
 * Lo que no aparece en `set` ni en `unset` queda igual.
 */
export interface ContractChanges {
    set: Partial<Record<ContractOptionalField, string>> & { form_stage?: FormStage };
    unset: ContractOptionalField[];
}

/**
 * Cuerpo crudo recibido del cliente. Los valores `null`, `""` o ausentes no
 * modifican nada; para borrar un campo se nombra en `clear_fields`.
 */
export type ContractPayload = Partial<Record<ContractOptionalField | "form_stage" | "clear_fields", unknown>>;

export interface ContractFilters {
    date_from?: string;
    no_dates?: boolean;
}

export interface ContractPageQuery extends ContractFilters {
    page: number;
    limit: number;
}

export interface ContractPage {
    items: Contract[];
    total_count: number;
}

export interface ContractStore {
    create(data: NewContract): Promise<Contract>;
    find_by_id(id: string): Promise<Contract | null>;
    update(id: string, changes: ContractChanges): Promise<Contract | null>;
    /** Todos los contratos, los actualizados más recientemente primero */
    list_all(): Promise<Contract[]>;
    /** Conteo y página se leen por separado; pueden venir de instantes distintos */
    list_page(query: { filters: ContractFilters; skip: number; limit: number }): Promise<ContractPage>;
}

export interface ContractResponse {
    id: string;
    user_id: string;
    zip: string | null;
    city: string | null;
    fuel_type: string | null;
    external_project_id: string | null;
    date: string | null;
    start_at_time: string | null;
    end_at_time: string | null;
    formatted_datetime: string | null;
    meeting_url: string | null;
    inspection_doc: string | null;
    invoice_doc: string | null;
    form_stage: FormStage;
    created_at: string;
    updated_at: string;
}

export type ContractListItem = Pick<
    ContractResponse,
    "id" | "zip" | "city" | "fuel_type" | "external_project_id" | "formatted_datetime" | "meeting_url" | "form_stage"
>;

export interface PaginationInfo {
    current_page: number;
    total_pages: number;
    limit: number;
    has_next_page: boolean;
    has_prev_page: boolean;
}
