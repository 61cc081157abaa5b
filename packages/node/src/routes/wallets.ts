/**
 * Wallet routes.
 *
 * POST   /api/v1/wallets                                   — Deploy a wallet
 * GET    /api/v1/wallets                                   — List wallets (offset pagination)
 * GET    /api/v1/wallets/:address                          — Wallet summary
 * POST   /api/v1/wallets/:address/proposals                — Propose a batch
 * GET    /api/v1/wallets/:address/proposals/:id            — Get a proposal
 * POST   /api/v1/wallets/:address/proposals/:id/votes      — Vote yes
 * DELETE /api/v1/wallets/:address/proposals/:id/votes      — Retract a yes
 * GET    /api/v1/wallets/:address/proposals/:id/votes/:voter — Vote status of one identity
 * POST   /api/v1/wallets/:address/proposals/:id/signed-votes — Vote with a signature
 * POST   /api/v1/wallets/:address/proposals/:id/execute    — Execute
 * POST   /api/v1/wallets/:address/proposals/:id/cancel     — Cancel as proposer
 * GET    /api/v1/wallets/:address/nonces/:signer           — Signature nonce
 * GET    /api/v1/wallets/:address/events                   — Event log + integrity
 *
 * Mutating routes name their sender in `from`.
 */

import { Hono } from "hono";
import { normalizeAddress } from "@quorumsafe/wallet";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateWalletSchema,
  ListEventsQuerySchema,
  OffsetQuerySchema,
  ProposalIdParamSchema,
  ProposeSchema,
  SenderSchema,
  SignedVoteSchema,
  toProposalResponse,
  toSignedVoteResponse,
  toWalletResponse,
} from "../types/dto.js";
import { pageMeta, paginate } from "../types/pagination.js";
import { parseJsonBody, parseQuery, parseWith } from "../middleware/validate.js";
import { NotFoundError } from "../services/wallet-service.js";

function parseProposalId(raw: string): number {
  return parseWith(ProposalIdParamSchema, raw, `Invalid proposal id: '${raw}'`);
}

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Wallets ────────────────────────────────────────────────────

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateWalletSchema);
    const wallet = c.get("service").createWallet(body.signers, body.salt);
    return c.json({ data: toWalletResponse(wallet) }, 201);
  });

  routes.get("/", (c) => {
    const query = parseQuery(c, OffsetQuerySchema);
    const service = c.get("service");
    return c.json({
      data: service.listWallets(query.offset, query.limit),
      pagination: pageMeta(query.offset, query.limit, service.networkInfo().walletCount),
    });
  });

  routes.get("/:address", (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    return c.json({ data: toWalletResponse(wallet) });
  });

  // ─── Proposals ──────────────────────────────────────────────────

  routes.post("/:address/proposals", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const body = await parseJsonBody(c, ProposeSchema);

    const id = wallet.propose(body.from, body.operations, body.expiration);

    return c.json({ data: toProposalResponse(wallet, wallet.getProposal(id)) }, 201);
  });

  routes.get("/:address/proposals/:id", (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const proposal = wallet.getProposal(parseProposalId(c.req.param("id")));

    if (proposal.status === "not-started") {
      throw new NotFoundError(`Proposal ${proposal.id} not found on ${wallet.address}`);
    }
    return c.json({ data: toProposalResponse(wallet, proposal) });
  });

  routes.post("/:address/proposals/:id/votes", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const body = await parseJsonBody(c, SenderSchema);

    wallet.voteFor(body.from, id);

    return c.json({ data: toProposalResponse(wallet, wallet.getProposal(id)) });
  });

  routes.delete("/:address/proposals/:id/votes", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const body = await parseJsonBody(c, SenderSchema);

    wallet.cancelVoteFor(body.from, id);

    return c.json({ data: toProposalResponse(wallet, wallet.getProposal(id)) });
  });

  routes.get("/:address/proposals/:id/votes/:voter", (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const voter = normalizeAddress(c.req.param("voter"), "Voter");
    const hasVoted = wallet.hasVoted(id, voter);
    const isSigner = wallet.isSigner(voter);

    return c.json({
      data: { proposalId: id, voter, hasVoted, isSigner, counted: hasVoted && isSigner },
    });
  });

  routes.post("/:address/proposals/:id/signed-votes", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const body = await parseJsonBody(c, SignedVoteSchema);

    const vote = wallet.voteOnBehalfOf(id, body.voter, body.support, body.signature);

    return c.json({ data: toSignedVoteResponse(vote) });
  });

  routes.post("/:address/proposals/:id/execute", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const body = await parseJsonBody(c, SenderSchema);

    const receipt = wallet.execute(body.from, id);

    return c.json({ data: receipt });
  });

  routes.post("/:address/proposals/:id/cancel", async (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const id = parseProposalId(c.req.param("id"));
    const body = await parseJsonBody(c, SenderSchema);

    const proposal = wallet.cancelProposal(body.from, id);

    return c.json({ data: toProposalResponse(wallet, proposal) });
  });

  // ─── Signatures & events ────────────────────────────────────────

  routes.get("/:address/nonces/:signer", (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const identity = normalizeAddress(c.req.param("signer"), "Signer");
    return c.json({ data: { identity, nonce: wallet.getNonce(identity) } });
  });

  routes.get("/:address/events", (c) => {
    const wallet = c.get("service").wallet(c.req.param("address"));
    const query = parseQuery(c, ListEventsQuerySchema);

    const page = paginate(wallet.getEvents(), query.offset, query.limit);
    return c.json({ ...page, integrity: wallet.verifyEventLog() });
  });

  return routes;
}
