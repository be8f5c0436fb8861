export interface Agency {
    _id: string;
    code: string;
    name: string;
    phone: string;
    website: string;
    to_apply_url: string;
    notes: string;
    created_at: Date;
    updated_at: Date;
}

export interface ZipProfile {
    _id: string;
    zip_code: string;
    city: string;
    fuel_type: string;
    sponsored: string;
    utility_type: string;
    has_utility: boolean;
    proceed_reason: string;
    is_dec: boolean;
    electrification_candidate: boolean;
    agency_code: string | null;
    created_at: Date;
    updated_at: Date;
}

export type NewAgency = Omit<Agency, "_id" | "created_at" | "updated_at">;
export type NewZipProfile = Omit<ZipProfile, "_id" | "created_at" | "updated_at">;

export interface ZipProfileFilters {
    zip_code: string;
    city?: string;
    fuel_type?: string;
}

export interface ContractorStore {
    find_profiles(filters: ZipProfileFilters): Promise<ZipProfile[]>;
    find_agency_by_code(code: string): Promise<Agency | null>;
    /** Borra el catálogo actual (agencias y perfiles) y carga el nuevo */
    replace_catalogue(data: { agencies: NewAgency[]; profiles: NewZipProfile[] }): Promise<{ agencies: number; profiles: number }>;
}

export type AgencyResponse = Omit<Agency, "_id" | "created_at" | "updated_at"> & {
    id: string;
    created_at: string;
    updated_at: string;
};

export type ZipProfileResponse = Omit<ZipProfile, "_id" | "created_at" | "updated_at"> & {
    id: string;
    created_at: string;
    updated_at: string;
};
