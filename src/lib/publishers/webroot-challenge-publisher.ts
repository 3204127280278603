import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { HTTP01_CHALLENGE_DIRECTORY } from '../constants/defaults.js';
import { assertValidChallengeToken } from '../core/acme-challenge-signer.js';
import type { ChallengePublisher } from '../types/collaborators.js';
import type { ChallengeProof } from '../types/proof.js';
import { debugChallenge } from '../utils/debug.js';

/** Document root of a domain, or a function mapping each domain to its own */
export type WebrootResolver = string | ((domain: string) => string);

/**
 * Serves http-01 proofs from a web server's document root.
 *
 * The compact proof is written to
 * `<webroot>/.well-known/acme-challenge/<token>`, creating directories as
 * needed. The web server must serve that path for the domain.
 */
export class WebrootChallengePublisher implements ChallengePublisher {
  constructor(private readonly webroot: WebrootResolver) {}

  /** Absolute path the proof for `token` is written to */
  challengePath(domain: string, token: string): string {
    assertValidChallengeToken(token);
    const root = typeof this.webroot === 'function' ? this.webroot(domain) : this.webroot;
    return join(root, HTTP01_CHALLENGE_DIRECTORY, token);
  }

  async provide(domain: string, token: string, proof: ChallengeProof): Promise<void> {
    const path = this.challengePath(domain, token);
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, proof.jws, 'utf-8');
    debugChallenge('published proof for %s at %s', domain, path);
  }
}
