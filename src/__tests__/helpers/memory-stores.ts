import {
    Contract,
    ContractChanges,
    ContractFilters,
    ContractPage,
    ContractStore,
    NewContract
} from "@/contracts/interfaces/contract.interface";
import { ContractFile, ContractFileStore, NewContractFile } from "@/contracts/interfaces/contract_file.interface";
import {
    Agency,
    ContractorStore,
    NewAgency,
    NewZipProfile,
    ZipProfile,
    ZipProfileFilters
} from "@/contracts/interfaces/contractor.interface";
import { BlobStorage, StoredObject } from "@/contracts/interfaces/storage.interface";
import { NewUser, User, UserStore } from "@/contracts/interfaces/user.interface";

/**
 * Reloj de prueba: cada llamada avanza un segundo desde 2026-01-01T00:00:00Z.
 */
export const create_clock = () => {
    let tick = 0;
    return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
};

const compare_strings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Réplica en memoria del `$sort` de `build_contract_page_pipeline`
 * (`date`, `_missing_start`, `start_at_time`, `_id`): sin fecha primero,
 * fecha ascendente, hora ascendente con las vacías al final, y _id.
 * Si cambia el pipeline hay que cambiar esto también; contract-query.test.ts
 * fija las claves del `$sort` que se replican aquí.
 */
export const compare_for_listing = (a: Contract, b: Contract): number => {
    const a_date = a.date ?? "";
    const b_date = b.date ?? "";
    if (a_date !== b_date) return compare_strings(a_date, b_date);

    const a_time = a.start_at_time ?? "";
    const b_time = b.start_at_time ?? "";
    if (a_time !== b_time) {
        if (!a_time) return 1;
        if (!b_time) return -1;
        return compare_strings(a_time, b_time);
    }

    return compare_strings(a._id, b._id);
};

// Réplica de build_contract_match: date null cubre null y campo ausente
const matches_filters = (contract: Contract, { date_from, no_dates }: ContractFilters): boolean => {
    const date = contract.date ?? null;
    if (no_dates === true) return date === null;
    if (no_dates === false && date === null) return false;
    if (date_from && (date === null || date < date_from)) return false;
    return true;
};

export class MemoryContractStore implements ContractStore {
    public records: Contract[] = [];
    public list_page_calls: { filters: ContractFilters; skip: number; limit: number }[] = [];
    public update_calls = 0;
    private sequence = 0;

    constructor(private readonly now: () => Date = create_clock()) {}

    public async create(data: NewContract): Promise<Contract> {
        const timestamp = this.now();
        const contract: Contract = {
            _id: `contract-${++this.sequence}`,
            ...data,
            created_at: timestamp,
            updated_at: timestamp
        };
        this.records.push(contract);
        return { ...contract };
    }

    public async find_by_id(id: string): Promise<Contract | null> {
        const contract = this.records.find((record) => record._id === id);
        return contract ? { ...contract } : null;
    }

    public async update(id: string, { set, unset }: ContractChanges): Promise<Contract | null> {
        this.update_calls++;
        const index = this.records.findIndex((record) => record._id === id);
        if (index === -1) return null;

        const updated: Contract = { ...this.records[index], ...set, updated_at: this.now() };
        for (const field of unset) delete updated[field];

        this.records[index] = updated;
        return { ...updated };
    }

    public async list_all(): Promise<Contract[]> {
        return [...this.records].sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime());
    }

    public async list_page(query: { filters: ContractFilters; skip: number; limit: number }): Promise<ContractPage> {
        this.list_page_calls.push(query);
        const filtered = this.records.filter((record) => matches_filters(record, query.filters)).sort(compare_for_listing);
        return {
            items: filtered.slice(query.skip, query.skip + query.limit),
            total_count: filtered.length
        };
    }
}

export class MemoryContractFileStore implements ContractFileStore {
    public records: ContractFile[] = [];
    public fail_next_create = false;
    private sequence = 0;

    constructor(private readonly now: () => Date = create_clock()) {}

    public async create(data: NewContractFile): Promise<ContractFile> {
        if (this.fail_next_create) {
            this.fail_next_create = false;
            throw new Error("write failed");
        }
        const timestamp = this.now();
        const file: ContractFile = { _id: `file-${++this.sequence}`, ...data, created_at: timestamp, updated_at: timestamp };
        this.records.push(file);
        return { ...file };
    }

    public async list_by_contract(contract_id: string): Promise<ContractFile[]> {
        return this.records.filter((record) => record.contract_id === contract_id);
    }

    public async delete_by_id(id: string): Promise<void> {
        this.records = this.records.filter((record) => record._id !== id);
    }
}

export class MemoryBlobStorage implements BlobStorage {
    public uploads: { file_name: string; folder: string; mimetype: string; size: number }[] = [];
    public deleted: string[] = [];

    public async upload(input: { buffer: Buffer; file_name: string; mimetype: string; folder: string }): Promise<StoredObject> {
        this.uploads.push({ file_name: input.file_name, folder: input.folder, mimetype: input.mimetype, size: input.buffer.length });
        const public_id = `${input.folder}/upload-${this.uploads.length}`;
        return { url: `https://files.test/${public_id}`, public_id };
    }

    public async delete_by_url(url: string): Promise<void> {
        this.deleted.push(url);
    }
}

export class MemoryUserStore implements UserStore {
    public records: User[] = [];
    private sequence = 0;

    constructor(private readonly now: () => Date = create_clock()) {}

    public async find_by_email(email: string): Promise<User | null> {
        return this.records.find((record) => record.email === email) ?? null;
    }

    public async create(data: NewUser): Promise<User> {
        const timestamp = this.now();
        const user: User = { _id: `user-${++this.sequence}`, ...data, created_at: timestamp, updated_at: timestamp };
        this.records.push(user);
        return user;
    }
}

export class MemoryContractorStore implements ContractorStore {
    public agencies: Agency[] = [];
    public profiles: ZipProfile[] = [];
    private readonly timestamp = new Date(Date.UTC(2026, 0, 1));

    public async find_profiles({ zip_code, city, fuel_type }: ZipProfileFilters): Promise<ZipProfile[]> {
        return this.profiles.filter((profile) =>
            profile.zip_code === zip_code &&
            (!city || profile.city === city) &&
            (!fuel_type || profile.fuel_type === fuel_type)
        );
    }

    public async find_agency_by_code(code: string): Promise<Agency | null> {
        return this.agencies.find((agency) => agency.code === code) ?? null;
    }

    public async replace_catalogue({ agencies, profiles }: { agencies: NewAgency[]; profiles: NewZipProfile[] }) {
        this.agencies = agencies.map((agency, index) => ({
            _id: `agency-${index + 1}`,
            ...agency,
            created_at: this.timestamp,
            updated_at: this.timestamp
        }));
        this.profiles = profiles.map((profile, index) => ({
            _id: `profile-${index + 1}`,
            ...profile,
            created_at: this.timestamp,
            updated_at: this.timestamp
        }));
        return { agencies: agencies.length, profiles: profiles.length };
    }
}
