import path from "path";
import { ContractChanges, ContractStore } from "@/contracts/interfaces/contract.interface";
import {
    CONTRACT_DOC_TYPES,
    ContractDocType,
    ContractFile,
    ContractFileStore,
    UploadedFile
} from "@/contracts/interfaces/contract_file.interface";
import { BlobStorage } from "@/contracts/interfaces/storage.interface";
import { ResponseError } from "@/utils/errors";

export const parse_doc_type = (value: unknown): ContractDocType | undefined => {
    if (value === undefined || value === null || value === "") return undefined;
    const doc_type = CONTRACT_DOC_TYPES.find((type) => type === value);
    if (!doc_type) throw new ResponseError(400, `doc_type debe ser uno de: ${CONTRACT_DOC_TYPES.join(", ")}`);
    return doc_type;
};

export class ContractFilesService {
    constructor(
        private readonly contracts: ContractStore,
        private readonly files: ContractFileStore,
        private readonly storage: BlobStorage
    ) {}

    /**
     * Sube el archivo a `contracts/<contract_id>` y registra el ContractFile.
     * Con `doc_type` la URL también queda en el campo del contrato.
     * Si falla el registro o el enlace al contrato, se eliminan el registro
     * y el archivo subido.
     */
    public async upload_contract_file({
        contract_id,
        file,
        doc_type
    }: {
        contract_id: string;
        file?: UploadedFile;
        doc_type?: ContractDocType;
    }): Promise<ContractFile> {
        try {
            const contract = await this.contracts.find_by_id(contract_id);
            if (!contract) throw new ResponseError(404, `Contrato ${contract_id} no encontrado`);

            if (!file || !file.originalname) throw new ResponseError(400, "Falta el nombre del archivo");
            if (!file.buffer || file.buffer.length === 0) throw new ResponseError(400, "El archivo está vacío");

            const stored = await this.storage.upload({
                buffer: file.buffer,
                file_name: file.originalname,
                mimetype: file.mimetype,
                folder: `contracts/${contract_id}`
            });

            let contract_file: ContractFile | null = null;
            try {
                contract_file = await this.files.create({
                    contract_id,
                    file_name: file.originalname,
                    file_ext: path.extname(file.originalname).replace(/^\./, ""),
                    file_url: stored.url
                });

                if (doc_type) {
                    const set: ContractChanges["set"] = {};
                    set[doc_type] = stored.url;
                    const updated = await this.contracts.update(contract_id, { set, unset: [] });
                    if (!updated) throw new ResponseError(404, `Contrato ${contract_id} no encontrado`);
                }

                return contract_file;
            } catch (error) {
                // Nada queda a medias: se borra el registro y el archivo subido
                if (contract_file) await this.discard_record(contract_file._id);
                await this.discard_upload(stored.url);
                throw error;
            }
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudo guardar el archivo del contrato");
        }
    }

    public async get_contract_files({ contract_id }: { contract_id: string }): Promise<ContractFile[]> {
        try {
            const contract = await this.contracts.find_by_id(contract_id);
            if (!contract) throw new ResponseError(404, `Contrato ${contract_id} no encontrado`);

            return await this.files.list_by_contract(contract_id);
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "No se pudieron listar los archivos del contrato");
        }
    }

    private async discard_record(id: string): Promise<void> {
        try {
            await this.files.delete_by_id(id);
        } catch (error) {
            console.error("❌ No se pudo eliminar el registro del archivo:", id, error);
        }
    }

    private async discard_upload(url: string): Promise<void> {
        try {
            await this.storage.delete_by_url(url);
        } catch (error) {
            console.error("❌ No se pudo eliminar el archivo huérfano:", url, error);
        }
    }
}
