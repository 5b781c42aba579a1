/**
 * SocialInteractionService v1.0.0
 *
 * Charges XP for comments, replies, awards and reports. Comment text never
 * reaches this service; it only authorizes and charges.
 *
 * Every authorized comment is stored once per (account, comment), free or
 * paid, so a retried authorization returns the stored outcome instead of
 * consuming another credit or charging again.
 *
 * Sequencing for awards: the actor's spend and the interaction row commit
 * first, in the actor's critical section. Only after that does the author's
 * reward run, in the author's critical section. An actor gives at most one
 * interaction per comment. With a request id each step is idempotent
 * (`<id>:spend`, `<id>:reward`), so a retry after a failure between the two
 * completes the reward without charging the actor again.
 */

import { ulid } from 'ulidx';
import { economyConfig, type EconomyConfig } from '../config';
import { failure, toServiceError } from '../lib/errors/error-handler';
import {
  CommentLockedError,
  DuplicateInteractionError,
  InternalError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import {
  accountIdSchema,
  authorizeCommentSchema,
  contentIdSchema,
  interactionKindSchema,
  parseOrThrow,
  recordInteractionSchema,
  type AuthorizeCommentInput,
  type RecordInteractionInput,
} from '../lib/validators';
import { socialLogger } from '../logger';
import type { LedgerStore, LedgerTx } from '../repositories';
import {
  POSITIVE_INTERACTIONS,
  type Account,
  type CommentAuthorizationRecord,
  type CommentInteraction,
  type InteractionKind,
  type PositiveInteraction,
  type ServiceResult,
  type XPTransaction,
} from '../types';
import { throwIfAborted, type TransactionManager } from './TransactionManager';
import { applyRate } from './XPCalculationEngine';

// ============================================================================
// TYPES
// ============================================================================

export interface CommentAuthorization {
  comment_id: string;
  is_reply: boolean;
  free: boolean;
  cost: number;
  transaction: XPTransaction | null;
}

export interface InteractionOutcome {
  interaction: InteractionKind;
  cost: number;
  spend_transaction: XPTransaction;
  author_reward: number;
  reward_transaction: XPTransaction | null;
}

export interface Affordability {
  can_afford: boolean;
  cost: number;
  spendable_xp: number;
  shortfall: number;
  free_comment_available: boolean;
}

export interface InteractionCosts {
  comment: number;
  reply: number;
  interactions: Record<InteractionKind, number>;
  author_reward_rate: string;
}

export interface SocialSummary {
  xp_spent_on_comments: number;
  xp_spent_on_interactions: number;
  xp_spent_on_reports: number;
  xp_earned_from_interactions: number;
  net_social_xp: number;
  comments_paid: number;
  interactions_given: number;
  interactions_received: number;
}

export function isPositiveInteraction(kind: InteractionKind): kind is PositiveInteraction {
  return POSITIVE_INTERACTIONS.some((positive) => positive === kind);
}

export class SocialInteractionService {
  constructor(
    private readonly store: LedgerStore,
    private readonly transactions: TransactionManager,
    private readonly config: EconomyConfig = economyConfig
  ) {}

  getCommentCost(isReply: boolean): number {
    return isReply ? this.config.social.replyCost : this.config.social.commentCost;
  }

  getInteractionCost(interaction: InteractionKind): number {
    return this.config.social.interactionCosts[interaction];
  }

  getAuthorReward(interaction: InteractionKind): number {
    if (!isPositiveInteraction(interaction)) return 0;
    return applyRate(this.getInteractionCost(interaction), this.config.social.authorRewardRate);
  }

  getInteractionCosts(): InteractionCosts {
    return {
      comment: this.config.social.commentCost,
      reply: this.config.social.replyCost,
      interactions: { ...this.config.social.interactionCosts },
      author_reward_rate: this.config.social.authorRewardRate,
    };
  }

  // ==========================================================================
  // COMMENTS
  // ==========================================================================

  /**
   * Requires any passed attempt on the content. A free-comment credit is
   * consumed before any XP is charged. Authorizing a comment that already
   * has a record returns that record.
   */
  async authorizeComment(
    input: AuthorizeCommentInput,
    signal?: AbortSignal
  ): Promise<ServiceResult<CommentAuthorization>> {
    try {
      const { accountId, contentId, commentId, isReply, requestId } = parseOrThrow(
        authorizeCommentSchema,
        input,
        'comment'
      );
      throwIfAborted(signal, 'comment authorization');

      const authorization = await this.transactions.runExclusive<CommentAuthorization>(accountId, async (tx) => {
        const existing = await tx.findCommentAuthorization(commentId);
        if (existing) {
          if (existing.content_id !== contentId || existing.is_reply !== isReply) {
            throw new ValidationError(`Comment ${commentId} was already authorized for a different target`, {
              commentId,
              contentId: existing.content_id,
              isReply: existing.is_reply,
            });
          }
          return this.toAuthorization(tx, existing);
        }

        if (requestId) {
          const reused = await tx.findCommentAuthorizationByRequestId(requestId);
          if (reused) {
            throw new ValidationError('Request id reused for a different operation', {
              requestId,
              commentId: reused.comment_id,
            });
          }
        }

        const attempts = await tx.listQuizAttempts(contentId);
        if (!attempts.some((a) => a.passed)) {
          throw new CommentLockedError(contentId);
        }

        const record: CommentAuthorizationRecord = {
          id: ulid(),
          account_id: tx.accountId,
          comment_id: commentId,
          content_id: contentId,
          is_reply: isReply,
          free: true,
          cost: 0,
          transaction_id: null,
          request_id: requestId ?? null,
          created_at: new Date(),
        };

        if ((await tx.getCommentCredits(contentId)) > 0) {
          throwIfAborted(signal, 'comment authorization');
          await tx.adjustCommentCredits(contentId, -1);
          await tx.insertCommentAuthorization(record);
          return { comment_id: commentId, is_reply: isReply, free: true, cost: 0, transaction: null };
        }

        const cost = this.getCommentCost(isReply);
        const transaction = await this.transactions.spendInTx(
          tx,
          cost,
          isReply ? 'comment_reply' : 'comment_post',
          `${isReply ? 'Reply' : 'Comment'} ${commentId} on ${contentId}`,
          { commentId, requestId, signal }
        );
        await tx.insertCommentAuthorization({ ...record, free: false, cost, transaction_id: transaction.id });
        return { comment_id: commentId, is_reply: isReply, free: false, cost, transaction };
      });

      socialLogger.info(
        { accountId, contentId, commentId, free: authorization.free, cost: authorization.cost },
        'Comment authorized'
      );
      return { success: true, data: authorization };
    } catch (error) {
      return failure(error);
    }
  }

  // ==========================================================================
  // INTERACTIONS
  // ==========================================================================

  /**
   * Actor pays first. Positive interactions then reward the author
   * floor(cost * rate); reports and self-interactions reward no one.
   * A second interaction by the same actor on the same comment fails with
   * DUPLICATE_INTERACTION unless it replays the first one's request id.
   */
  async recordInteraction(
    input: RecordInteractionInput,
    signal?: AbortSignal
  ): Promise<ServiceResult<InteractionOutcome>> {
    let spendTransaction: XPTransaction | null = null;
    try {
      const { actorId, commentId, commentAuthorId, interaction, requestId } = parseOrThrow(
        recordInteractionSchema,
        input,
        'interaction'
      );
      await this.requireAccount(commentAuthorId);
      throwIfAborted(signal, 'interaction');

      const cost = this.getInteractionCost(interaction);
      const positive = isPositiveInteraction(interaction);

      const spent = await this.transactions.runExclusive(actorId, async (tx) => {
        const existing = await tx.findInteraction(commentId);
        if (existing) {
          const replay =
            requestId !== undefined &&
            existing.request_id === requestId &&
            existing.interaction === interaction &&
            existing.comment_author_id === commentAuthorId;
          if (!replay) {
            throw new DuplicateInteractionError(commentId, existing.interaction);
          }
          return this.requireTransaction(tx, existing.transaction_id);
        }

        const transaction = await this.transactions.spendInTx(
          tx,
          cost,
          positive ? 'interaction_given' : 'report_filed',
          `${interaction} on comment ${commentId}`,
          { commentId, requestId: requestId ? `${requestId}:spend` : undefined, signal }
        );
        const row: CommentInteraction = {
          id: ulid(),
          account_id: tx.accountId,
          comment_id: commentId,
          comment_author_id: commentAuthorId,
          interaction,
          cost,
          transaction_id: transaction.id,
          request_id: requestId ?? null,
          created_at: new Date(),
        };
        await tx.insertInteraction(row);
        return transaction;
      });
      spendTransaction = spent;

      const reward = commentAuthorId === actorId ? 0 : this.getAuthorReward(interaction);
      const rewardTransaction =
        reward > 0
          ? await this.transactions.runExclusive(commentAuthorId, (tx) =>
              this.transactions.earnInTx(
                tx,
                reward,
                'interaction_received',
                `${interaction} received on comment ${commentId}`,
                { commentId, requestId: requestId ? `${requestId}:reward` : undefined }
              )
            )
          : null;

      socialLogger.info(
        { actorId, commentAuthorId, commentId, interaction, cost, reward },
        'Interaction recorded'
      );

      return {
        success: true,
        data: {
          interaction,
          cost,
          spend_transaction: spent,
          author_reward: reward,
          reward_transaction: rewardTransaction,
        },
      };
    } catch (error) {
      if (!spendTransaction) {
        return failure(error);
      }
      // Actor charged, author reward not yet committed: retry with the same request id.
      const serviceError = toServiceError(error);
      socialLogger.error(
        { spendTransactionId: spendTransaction.id, code: serviceError.code },
        'Author reward failed after actor spend committed'
      );
      return {
        success: false,
        error: {
          ...serviceError,
          details: { ...serviceError.details, actorCharged: true, spendTransactionId: spendTransaction.id },
        },
      };
    }
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  async canAffordComment(
    accountId: string,
    contentId: string,
    isReply: boolean = false
  ): Promise<ServiceResult<Affordability>> {
    try {
      const account = await this.requireAccount(accountId);
      parseOrThrow(contentIdSchema, contentId, 'contentId');
      const freeAvailable = (await this.store.getCommentCredits(account.id, contentId)) > 0;
      const cost = freeAvailable ? 0 : this.getCommentCost(isReply);
      return { success: true, data: this.affordability(account, cost, freeAvailable) };
    } catch (error) {
      return failure(error);
    }
  }

  async canAffordInteraction(
    accountId: string,
    interaction: InteractionKind
  ): Promise<ServiceResult<Affordability>> {
    try {
      const account = await this.requireAccount(accountId);
      const kind = parseOrThrow(interactionKindSchema, interaction, 'interaction');
      return { success: true, data: this.affordability(account, this.getInteractionCost(kind), false) };
    } catch (error) {
      return failure(error);
    }
  }

  async getSocialSummary(accountId: string): Promise<ServiceResult<SocialSummary>> {
    try {
      const account = await this.requireAccount(accountId);
      const rows = await this.store.listTransactions(account.id);

      const summary: SocialSummary = {
        xp_spent_on_comments: 0,
        xp_spent_on_interactions: 0,
        xp_spent_on_reports: 0,
        xp_earned_from_interactions: 0,
        net_social_xp: 0,
        comments_paid: 0,
        interactions_given: 0,
        interactions_received: 0,
      };

      for (const row of rows) {
        switch (row.source) {
          case 'comment_post':
          case 'comment_reply':
            summary.xp_spent_on_comments -= row.amount;
            summary.comments_paid++;
            break;
          case 'interaction_given':
            summary.xp_spent_on_interactions -= row.amount;
            summary.interactions_given++;
            break;
          case 'report_filed':
            summary.xp_spent_on_reports -= row.amount;
            break;
          case 'interaction_received':
            summary.xp_earned_from_interactions += row.amount;
            summary.interactions_received++;
            break;
          default:
            continue;
        }
        summary.net_social_xp += row.amount;
      }

      return { success: true, data: summary };
    } catch (error) {
      return failure(error);
    }
  }

  private async toAuthorization(tx: LedgerTx, record: CommentAuthorizationRecord): Promise<CommentAuthorization> {
    return {
      comment_id: record.comment_id,
      is_reply: record.is_reply,
      free: record.free,
      cost: record.cost,
      transaction: record.transaction_id ? await this.requireTransaction(tx, record.transaction_id) : null,
    };
  }

  private async requireTransaction(tx: LedgerTx, transactionId: string): Promise<XPTransaction> {
    const transaction = await tx.findTransaction(transactionId);
    if (!transaction) {
      throw new InternalError(`Transaction ${transactionId} referenced by account ${tx.accountId} is missing`);
    }
    return transaction;
  }

  private affordability(account: Account, cost: number, freeAvailable: boolean): Affordability {
    return {
      can_afford: !account.spending_frozen && account.spendable_xp >= cost,
      cost,
      spendable_xp: account.spendable_xp,
      shortfall: Math.max(cost - account.spendable_xp, 0),
      free_comment_available: freeAvailable,
    };
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
    const account = await this.store.getAccount(id);
    if (!account) {
      throw new NotFoundError(`Account with id '${id}' not found`);
    }
    return account;
  }
}
