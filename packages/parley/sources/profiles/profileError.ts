export class ProfileError extends Error {
    readonly profileName: string;

    constructor(profileName: string, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "ProfileError";
        this.profileName = profileName;
    }
}
