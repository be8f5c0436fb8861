export interface ContractFile {
    _id: string;
    contract_id: string;
    file_name: string;
    file_ext: string;
    file_url: string;
    created_at: Date;
    updated_at: Date;
}

export type NewContractFile = Pick<ContractFile, "contract_id" | "file_name" | "file_ext" | "file_url">;

export interface ContractFileStore {
    create(data: NewContractFile): Promise<ContractFile>;
    list_by_contract(contract_id: string): Promise<ContractFile[]>;
    delete_by_id(id: string): Promise<void>;
}

export interface ContractFileResponse {
    id: string;
    contract_id: string;
    file_name: string;
    file_ext: string;
    file_url: string;
    created_at: string;
    updated_at: string;
}

// Documentos del contrato que pueden quedar apuntando a un archivo subido
export const CONTRACT_DOC_TYPES = ["inspection_doc", "invoice_doc"] as const;
export type ContractDocType = typeof CONTRACT_DOC_TYPES[number];

export type UploadedFile = Pick<Express.Multer.File, "originalname" | "buffer" | "mimetype">;
