import { beforeEach, describe, expect, it } from "vitest";
import { ContractFilesService, parse_doc_type } from "@/services/contract_files.service";
import {
    MemoryBlobStorage,
    MemoryContractFileStore,
    MemoryContractStore
} from "../../__tests__/helpers/memory-stores";

const pdf = (name = "inspection.pdf") => ({
    originalname: name,
    buffer: Buffer.from("%PDF-1.4 test"),
    mimetype: "application/pdf"
});

describe("parse_doc_type", () => {
    it("accepts the contract document fields", () => {
        expect(parse_doc_type("inspection_doc")).toBe("inspection_doc");
        expect(parse_doc_type("invoice_doc")).toBe("invoice_doc");
    });

    it("treats empty values as absent", () => {
        expect(parse_doc_type(undefined)).toBeUndefined();
        expect(parse_doc_type("")).toBeUndefined();
    });

    it("rejects other fields", () => {
        expect(() => parse_doc_type("meeting_url")).toThrow("doc_type debe ser uno de: inspection_doc, invoice_doc");
    });
});

describe("ContractFilesService", () => {
    let contracts: MemoryContractStore;
    let files: MemoryContractFileStore;
    let storage: MemoryBlobStorage;
    let service: ContractFilesService;
    let contract_id: string;

    beforeEach(async () => {
        contracts = new MemoryContractStore();
        files = new MemoryContractFileStore();
        storage = new MemoryBlobStorage();
        service = new ContractFilesService(contracts, files, storage);
        contract_id = (await contracts.create({ user_id: "user-1", form_stage: "documents" }))._id;
    });

    describe("upload_contract_file", () => {
        it("stores the blob under the contract folder and records the file", async () => {
            const file = await service.upload_contract_file({ contract_id, file: pdf() });

            expect(storage.uploads).toEqual([
                { file_name: "inspection.pdf", folder: `contracts/${contract_id}`, mimetype: "application/pdf", size: 13 }
            ]);
            expect(file).toMatchObject({
                _id: "file-1",
                contract_id,
                file_name: "inspection.pdf",
                file_ext: "pdf",
                file_url: `https://files.test/contracts/${contract_id}/upload-1`
            });
        });

        it("keeps an empty extension for names without one", async () => {
            const file = await service.upload_contract_file({ contract_id, file: pdf("README") });
            expect(file.file_ext).toBe("");
        });

        it("binds the url to the contract when doc_type is given", async () => {
            const file = await service.upload_contract_file({ contract_id, file: pdf(), doc_type: "invoice_doc" });
            const contract = await contracts.find_by_id(contract_id);

            expect(contract?.invoice_doc).toBe(file.file_url);
            expect(contract?.inspection_doc).toBeUndefined();
        });

        it("signals not found for an unknown contract without uploading", async () => {
            await expect(service.upload_contract_file({ contract_id: "missing", file: pdf() })).rejects.toMatchObject({
                statusCode: 404,
                kind: "not_found"
            });
            expect(storage.uploads).toHaveLength(0);
        });

        it("rejects a file without name", async () => {
            await expect(service.upload_contract_file({ contract_id, file: pdf("") })).rejects.toMatchObject({
                statusCode: 400,
                message: "Falta el nombre del archivo"
            });
            await expect(service.upload_contract_file({ contract_id })).rejects.toMatchObject({ statusCode: 400 });
        });

        it("rejects empty content", async () => {
            const empty = { ...pdf(), buffer: Buffer.alloc(0) };
            await expect(service.upload_contract_file({ contract_id, file: empty })).rejects.toMatchObject({
                statusCode: 400,
                message: "El archivo está vacío"
            });
            expect(storage.uploads).toHaveLength(0);
        });

        it("deletes the uploaded blob when the record cannot be saved", async () => {
            files.fail_next_create = true;

            await expect(service.upload_contract_file({ contract_id, file: pdf(), doc_type: "inspection_doc" })).rejects.toMatchObject({
                statusCode: 500,
                kind: "upstream_failure"
            });
            expect(storage.deleted).toEqual([`https://files.test/contracts/${contract_id}/upload-1`]);
            expect(files.records).toHaveLength(0);
            expect((await contracts.find_by_id(contract_id))?.inspection_doc).toBeUndefined();
        });

        it("rolls back the record and the blob when the contract cannot be linked", async () => {
            contracts.update = async () => {
                throw new Error("write conflict");
            };

            await expect(service.upload_contract_file({ contract_id, file: pdf(), doc_type: "invoice_doc" })).rejects.toMatchObject({
                statusCode: 500,
                kind: "upstream_failure"
            });
            expect(files.records).toHaveLength(0);
            expect(storage.deleted).toEqual([`https://files.test/contracts/${contract_id}/upload-1`]);
        });

        it("signals not found when the contract disappears before linking", async () => {
            contracts.update = async () => null;

            await expect(service.upload_contract_file({ contract_id, file: pdf(), doc_type: "inspection_doc" })).rejects.toMatchObject({
                statusCode: 404,
                kind: "not_found"
            });
            expect(files.records).toHaveLength(0);
            expect(storage.deleted).toEqual([`https://files.test/contracts/${contract_id}/upload-1`]);
        });
    });

    describe("get_contract_files", () => {
        it("lists the files of the contract in upload order", async () => {
            const other_id = (await contracts.create({ user_id: "user-1", form_stage: "project_id" }))._id;
            await service.upload_contract_file({ contract_id, file: pdf("a.pdf") });
            await service.upload_contract_file({ contract_id: other_id, file: pdf("b.pdf") });
            await service.upload_contract_file({ contract_id, file: pdf("c.png") });

            const listed = await service.get_contract_files({ contract_id });
            expect(listed.map((file) => file.file_name)).toEqual(["a.pdf", "c.png"]);
        });

        it("signals not found for an unknown contract", async () => {
            await expect(service.get_contract_files({ contract_id: "missing" })).rejects.toMatchObject({ statusCode: 404 });
        });
    });
});
