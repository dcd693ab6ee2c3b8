/**
 * Collaborator Capability Types
 *
 * The key/secret backend is external. The servers only reach it through
 * these interfaces; a rejected promise is the error outcome.
 */

/** Anything carrying DER bytes. node:crypto's X509Certificate fits. */
export interface Certificate {
  raw: Uint8Array;
}

/** Leaf first by convention, order is not enforced */
export type CertificateChain = Certificate[];

export interface CertificateProvider {
  lookupCertificates(keyname: string): Promise<CertificateChain>;
}

export interface KeyNameProvider {
  activeKeyName(): Promise<string>;
}

export interface SecretChecker {
  checkSecret(payload: Buffer): Promise<boolean>;
}

export interface SecretRotator {
  rotateSecret(payload: Buffer): Promise<Buffer | Uint8Array>;
}

export interface BlacklistReporter {
  /** Resolves to whether the report caused a new key to be generated */
  reportBlacklist(keyname: string): Promise<boolean>;
}

export interface GenerationTrigger {
  /** Fire-and-acknowledge: no outcome is reported back */
  triggerGeneration(): void;
}

export interface PublicCollaborators
  extends CertificateProvider,
    KeyNameProvider,
    SecretChecker,
    SecretRotator {}

export interface AdminCollaborators extends BlacklistReporter, GenerationTrigger {}

export interface Collaborators extends PublicCollaborators, AdminCollaborators {}
