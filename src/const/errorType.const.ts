export const COLLAB_ERROR_MESSAGES = {
    INVALID_MESSAGE : 'Message could not be understood.',
    DOCUMENT_MISSING : 'A document id is required to join a collaboration session.',
    UNAUTHENTICATED : '401',
    SAVE_FAILED : 'The document could not be saved. Please try again.',
    NOT_JOINED : 'Join the document before sending changes.',
} as const;
