import { Contract, ContractListItem, ContractResponse } from "@/contracts/interfaces/contract.interface";
import { ContractFile, ContractFileResponse } from "@/contracts/interfaces/contract_file.interface";
import { Agency, AgencyResponse, ZipProfile, ZipProfileResponse } from "@/contracts/interfaces/contractor.interface";
import { User, UserResponse } from "@/contracts/interfaces/user.interface";
import { format_contract_datetime } from "@/utils/dates";

const iso = (value?: Date | null): string => (value ? new Date(value).toISOString() : "");

export const to_contract_response = (contract: Contract): ContractResponse => ({
    id: contract._id,
    user_id: contract.user_id,
    zip: contract.zip ?? null,
    city: contract.city ?? null,
    fuel_type: contract.fuel_type ?? null,
    external_project_id: contract.external_project_id ?? null,
    date: contract.date ?? null,
    start_at_time: contract.start_at_time ?? null,
    end_at_time: contract.end_at_time ?? null,
    formatted_datetime: format_contract_datetime(contract.date, contract.start_at_time),
    meeting_url: contract.meeting_url ?? null,
    inspection_doc: contract.inspection_doc ?? null,
    invoice_doc: contract.invoice_doc ?? null,
    form_stage: contract.form_stage,
    created_at: iso(contract.created_at),
    updated_at: iso(contract.updated_at)
});

export const to_contract_list_item = (contract: Contract): ContractListItem => ({
    id: contract._id,
    zip: contract.zip ?? null,
    city: contract.city ?? null,
    fuel_type: contract.fuel_type ?? null,
    external_project_id: contract.external_project_id ?? null,
    formatted_datetime: format_contract_datetime(contract.date, contract.start_at_time),
    meeting_url: contract.meeting_url ?? null,
    form_stage: contract.form_stage
});

export const to_contract_file_response = (file: ContractFile): ContractFileResponse => ({
    id: file._id,
    contract_id: file.contract_id,
    file_name: file.file_name,
    file_ext: file.file_ext,
    file_url: file.file_url,
    created_at: iso(file.created_at),
    updated_at: iso(file.updated_at)
});

export const to_user_response = (user: User): UserResponse => ({
    id: user._id,
    email: user.email,
    full_name: user.full_name,
    created_at: iso(user.created_at),
    updated_at: iso(user.updated_at)
});

export const to_agency_response = ({ _id, created_at, updated_at, ...agency }: Agency): AgencyResponse => ({
    id: _id,
    ...agency,
    created_at: iso(created_at),
    updated_at: iso(updated_at)
});

export const to_zip_profile_response = ({ _id, created_at, updated_at, ...profile }: ZipProfile): ZipProfileResponse => ({
    id: _id,
    ...profile,
    created_at: iso(created_at),
    updated_at: iso(updated_at)
});
