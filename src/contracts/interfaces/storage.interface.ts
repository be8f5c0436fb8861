export interface StoredObject {
    url: string;
    public_id: string;
}

export interface BlobStorage {
    upload(input: { buffer: Buffer; file_name: string; mimetype: string; folder: string }): Promise<StoredObject>;
    delete_by_url(url: string): Promise<void>;
}
