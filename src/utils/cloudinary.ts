import crypto from "crypto";
import path from "path";
import { v2 as cloudinary, UploadApiOptions } from "cloudinary";
import { BlobStorage, StoredObject } from "@/contracts/interfaces/storage.interface";
import { ResponseError } from "./errors";

type ResourceType = "image" | "video" | "raw";

/**
 * Determina el tipo de recurso según el mimetype.
 * Documentos y binarios van como `raw` para guardarse sin procesar.
 */
export const get_resource_type = (mimetype: string): ResourceType => {
    if (mimetype.startsWith("image/") && mimetype !== "image/svg+xml") return "image";
    // Cloudinary usa 'video' para audio también
    if (mimetype.startsWith("video/") || mimetype.startsWith("audio/")) return "video";
    return "raw";
};

/**
 * Extrae tipo de recurso y public_id de una URL de entrega:
 * https://res.cloudinary.com/<cloud>/<resource_type>/upload/v<version>/<public_id>[.<ext>]
 * En `raw` la extensión hace parte del public_id.
 */
export const parse_cloudinary_url = (url: string): { resource_type: ResourceType; public_id: string } | null => {
    const match = /\/(image|video|raw)\/(?:upload|authenticated|private)\/(?:v\d+\/)?(.+)$/.exec(url);
    if (!match) return null;

    const resource_type: ResourceType = match[1] === "image" || match[1] === "video" ? match[1] : "raw";
    const asset = decodeURIComponent(match[2].split("?")[0]);
    const public_id = resource_type === "raw" ? asset : asset.replace(/\.[^/.]+$/, "");

    return { resource_type, public_id };
};

export class CloudinaryStorage implements BlobStorage {
    constructor(
        config: { cloud_name: string; api_key: string; api_secret: string },
        private readonly root_folder: string
    ) {
        cloudinary.config({ ...config, secure: true });
    }

    public async upload({
        buffer,
        file_name,
        mimetype,
        folder
    }: {
        buffer: Buffer;
        file_name: string;
        mimetype: string;
        folder: string;
    }): Promise<StoredObject> {
        try {
            const resource_type = get_resource_type(mimetype);
            const extension = path.extname(file_name);

            // Nombre único; en raw se conserva la extensión para descargar el archivo tal cual
            const base_id = `${this.root_folder}/${folder}/${crypto.randomUUID()}`;
            const options: UploadApiOptions = {
                resource_type,
                public_id: resource_type === "raw" ? `${base_id}${extension}` : base_id,
            };
            if (resource_type !== "raw") options.quality = "auto";

            const data_uri = `data:${mimetype || "application/octet-stream"};base64,${buffer.toString("base64")}`;
            const result = await cloudinary.uploader.upload(data_uri, options);

            return { url: result.secure_url, public_id: result.public_id };
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "Error al subir el archivo");
        }
    }

    public async delete_by_url(url: string): Promise<void> {
        const asset = parse_cloudinary_url(url);
        if (!asset) throw new ResponseError(400, `URL de archivo no reconocida: ${url}`);

        try {
            await cloudinary.uploader.destroy(asset.public_id, { resource_type: asset.resource_type });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            throw new ResponseError(500, "Error al eliminar el archivo");
        }
    }
}
