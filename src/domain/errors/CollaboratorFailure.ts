export type Collaborator = "text-generator" | "file-parser" | "message-bus";

export class CollaboratorFailure extends Error {
  constructor(
    public readonly collaborator: Collaborator,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollaboratorFailure";
  }
}
