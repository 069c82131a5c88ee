/**
 * Durable document text lives in the document service; the collaboration
 * core only loads it into a live buffer and hands it back.
 *
 * @interface
 */
export interface IDocumentStore {

    /** Current content, or an empty string for a document with none. */
    load(
        documentId : string
    ) : Promise<string>;

    save(
        documentId : string,
        content : string
    ) : Promise<void>;
}
