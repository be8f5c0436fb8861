import multer, { FileFilterCallback } from "multer";
import { NextFunction, Request, Response } from "express";
import { ResponseError } from "@/utils/errors";
import { send_error } from "@/utils/express";

const storage = multer.memoryStorage();

const allowedMimeTypes = [
    // Imágenes (fotos de inspección)
    "image/jpeg",
    "image/jpg",
    "image/png",
    "image/webp",
    "image/heic",
    "image/tiff",

    // Documentos PDF
    "application/pdf",

    // Documentos Microsoft Office
    "application/msword", // .doc
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document", // .docx
    "application/vnd.ms-excel", // .xls
    "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet", // .xlsx

    // Documentos OpenOffice/LibreOffice
    "application/vnd.oasis.opendocument.text", // .odt
    "application/vnd.oasis.opendocument.spreadsheet", // .ods

    // Texto
    "text/plain",
    "text/csv",

    // Comprimidos
    "application/zip",
    "application/x-zip-compressed",
];

const fileFilter = (req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
    if (allowedMimeTypes.includes(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new ResponseError(400, `Tipo de archivo no permitido: ${file.mimetype}. Tipos permitidos: imágenes, PDF, documentos de Office, texto y comprimidos.`));
    }
};

export const upload = multer({
    storage,
    fileFilter,
    limits: {
        fileSize: 50 * 1024 * 1024, // 50MB
    }
});

/**
 * `upload.single(field)` con los errores de multer en el mismo formato que el resto de la API.
 */
export const upload_single = (field: string) => (req: Request, res: Response, next: NextFunction): void => {
    upload.single(field)(req, res, (error: unknown) => {
        if (!error) {
            next();
            return;
        }
        if (error instanceof multer.MulterError) {
            send_error(res, new ResponseError(400, `Error al recibir el archivo: ${error.message}`), "Error al recibir el archivo");
            return;
        }
        send_error(res, error, "Error al recibir el archivo");
    });
};
