import { Injectable } from '@nestjs/common';
import { ConfidenceScore, Verifier } from '../interfaces/capabilities.interface';

@Injectable()
export class MockVerifier implements Verifier {
  verify(contactChannel: string): Promise<ConfidenceScore> {
    const email = contactChannel.toLowerCase();
    if (!/^[^@\s]+@[^@\s]+\.[a-z]{2,}$/.test(email)) {
      return Promise.resolve({ status: 'undeliverable', score: 0, reason: 'invalid syntax' });
    }
    if (email.startsWith('info@') || email.startsWith('contact@')) {
      return Promise.resolve({ status: 'risky', score: 60, reason: 'role address' });
    }
    return Promise.resolve({ status: 'deliverable', score: 95, reason: null });
  }
}
