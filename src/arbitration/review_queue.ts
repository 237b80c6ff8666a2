/**
 * ReviewQueue: parks arbitration requests until a human answers
 * through the API. Each pending request holds the promise the
 * arbitrating round is waiting on.
 */

import { ArbitrationError, RecordNotFoundError } from "../shared/errors.js";
import type { ArbitrationRequest, ReviewDecision, Reviewer } from "./arbitrator.js";

interface PendingReview {
  request: ArbitrationRequest;
  resolve: (decision: ReviewDecision) => void;
  reject: (err: Error) => void;
}

export type ReviewListener = (request: ArbitrationRequest) => void;

export class ReviewQueue implements Reviewer {
  private pending = new Map<string, PendingReview>();
  private listeners: ReviewListener[] = [];

  review(request: ArbitrationRequest): Promise<ReviewDecision> {
    return new Promise<ReviewDecision>((resolve, reject) => {
      this.pending.set(request.requestId, { request, resolve, reject });
      for (const listener of this.listeners) listener(request);
    });
  }

  /** Called whenever a new request is parked. */
  onRequest(listener: ReviewListener): void {
    this.listeners.push(listener);
  }

  list(): ArbitrationRequest[] {
    return [...this.pending.values()].map((p) => p.request);
  }

  get(requestId: string): ArbitrationRequest | undefined {
    return this.pending.get(requestId)?.request;
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Hand the decision to the waiting round. Decision validation happens
   * in `arbitrate`, which rejects the round on bad input.
   */
  submit(requestId: string, decision: ReviewDecision): void {
    const entry = this.take(requestId);
    entry.resolve(decision);
  }

  /** Abandon a request; the waiting round fails with ArbitrationError. */
  cancel(requestId: string, reason: string): void {
    const entry = this.take(requestId);
    entry.reject(new ArbitrationError(`Review ${requestId} cancelled: ${reason}`));
  }

  private take(requestId: string): PendingReview {
    const entry = this.pending.get(requestId);
    if (!entry) throw new RecordNotFoundError(`review::${requestId}`);
    this.pending.delete(requestId);
    return entry;
  }
}
