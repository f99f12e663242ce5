/**
 * DAO Registry
 * Create/lookup/deactivate organizations and route proposals to them
 */

import {
  registryLogger as logger,
  daoRegistrationSchema,
  type AccountId,
  type DaoRegistrationInput,
  type ProposalDraftInput,
} from "@civitas/shared";
import type { ActionContext } from "../clock.js";
import type { GovernanceEventBus } from "../audit/index.js";
import type { FundingEscrow } from "../funding/index.js";
import { ProposalLifecycle, type Proposal } from "../proposals/index.js";
import { KeyedStore, type UnitOfWork } from "../store/index.js";
import {
  AlreadyExistsError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
  fromZodError,
} from "../errors.js";
import type { DaoKey, DaoRecord, ProposalView } from "./types.js";

const registryLogger = logger.child({ component: "dao-registry" });

export class DaoRegistry {
  private readonly daos: KeyedStore<DaoKey, DaoRecord>;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly events: GovernanceEventBus,
    private readonly lifecycle: ProposalLifecycle,
    private readonly escrow: FundingEscrow
  ) {
    this.daos = new KeyedStore("daos", unitOfWork);
  }

  getDao(daoId: AccountId): DaoRecord | undefined {
    return this.daos.get([daoId]);
  }

  listDaos(filter: { active?: boolean } = {}): DaoRecord[] {
    return this.daos.filter((d) => filter.active === undefined || d.active === filter.active);
  }

  createDao(ctx: ActionContext, input: DaoRegistrationInput): DaoRecord {
    const parsed = daoRegistrationSchema.safeParse(input);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }

    return this.unitOfWork.run(() => {
      if (this.daos.has([parsed.data.id])) {
        throw new AlreadyExistsError(`DAO ${parsed.data.id} already exists`, "id");
      }

      const dao: DaoRecord = {
        ...parsed.data,
        owner: ctx.caller,
        active: true,
        createdAt: ctx.epoch,
      };
      this.daos.put([dao.id], dao);

      this.events.publish(ctx, "dao_created", { daoId: dao.id }, { name: dao.name, owner: dao.owner });
      registryLogger.info({ daoId: dao.id, owner: dao.owner }, "DAO created");

      return dao;
    });
  }

  deactivateDao(ctx: ActionContext, daoId: AccountId): DaoRecord {
    return this.unitOfWork.run(() => {
      const dao = this.requireDao(daoId);
      this.assertController(ctx, dao);
      if (!dao.active) {
        throw new InvalidStateError(`DAO ${daoId} is already inactive`, "active");
      }

      const updated: DaoRecord = { ...dao, active: false, deactivatedAt: ctx.epoch };
      this.daos.put([daoId], updated);

      this.events.publish(ctx, "dao_deactivated", { daoId }, { active: false });
      registryLogger.info({ daoId }, "DAO deactivated");

      return updated;
    });
  }

  /**
   * Register a proposal on behalf of an active organization
   */
  registerProposal(ctx: ActionContext, draft: ProposalDraftInput): Proposal {
    return this.unitOfWork.run(() => {
      const dao = this.requireDao(draft.organization);
      if (!dao.active) {
        throw new InvalidStateError(`DAO ${dao.id} is inactive`, "organization");
      }
      this.assertController(ctx, dao);

      return this.lifecycle.register(ctx, draft);
    });
  }

  executeProposal(ctx: ActionContext, proposalId: AccountId): Proposal {
    return this.unitOfWork.run(() => {
      const proposal = this.lifecycle.getProposal(proposalId);
      if (!proposal) {
        throw new NotFoundError(`Proposal ${proposalId} not found`, "proposalId");
      }
      this.assertController(ctx, this.requireDao(proposal.organization));

      return this.lifecycle.execute(ctx, proposalId);
    });
  }

  getProposalView(proposalId: AccountId, epoch: number): ProposalView | undefined {
    const proposal = this.lifecycle.getProposal(proposalId);
    if (!proposal) return undefined;

    const tally = this.lifecycle.getTally(proposalId);
    const record = this.escrow.getFundingRecord(proposalId);

    return {
      proposal,
      tally,
      approvalPercentage: ProposalLifecycle.computeApproval(tally),
      funding: record
        ? {
            phase: this.escrow.getPhase(proposalId, epoch),
            progressPercentage: this.escrow.getProgress(proposalId),
            totalRaised: record.totalRaised,
            funderCount: record.funderCount,
          }
        : undefined,
    };
  }

  private requireDao(daoId: AccountId): DaoRecord {
    const dao = this.daos.get([daoId]);
    if (!dao) {
      throw new NotFoundError(`DAO ${daoId} not found`, "organization");
    }
    return dao;
  }

  private assertController(ctx: ActionContext, dao: DaoRecord): void {
    if (ctx.caller !== dao.owner && ctx.caller !== dao.id) {
      throw new UnauthorizedError(`${ctx.caller} does not control DAO ${dao.id}`, "caller");
    }
  }
}
