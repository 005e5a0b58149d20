import express, { Express, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import { parseRole } from '../access/roles';
import { COSMETIC_CATEGORIES } from '../catalog/types';
import { tierName } from '../ledger/tiers';
import { LedgerPlatform } from '../platform';
import { paginate, parsePagination } from '../scaling/pagination';
import { NotificationStream } from './notification-stream';
import { BadRequestError, toHttpError } from './http-errors';
import { parseClaimRelay, parseListingId, parseRegisterRelay, parseStatsRelay } from './relay-requests';

type Handler = (req: Request, res: Response) => void;

const MAX_NOTIFICATIONS_PER_PAGE = 1000;

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function firstQueryValue(value: unknown): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return typeof raw === 'string' ? raw : undefined;
}

export class LedgerApiServer {
  readonly app: Express;
  private readonly stream: NotificationStream;
  private httpServer?: http.Server;

  constructor(
    private readonly platform: LedgerPlatform,
    private readonly port: number
  ) {
    this.app = express();
    this.app.set('json replacer', bigintReplacer);
    this.stream = new NotificationStream({
      notifications: platform.notifications,
      logger: platform.logger,
      metrics: platform.metrics,
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  private get log() {
    return this.platform.logger;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '256kb' }));
    this.app.use(this.platform.metrics.httpMiddleware());

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type, X-Relayer');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  /** Wraps a handler so ledger errors become JSON responses. */
  private route(handler: Handler): Handler {
    return (req, res) => {
      try {
        handler(req, res);
      } catch (error) {
        const { status, body } = toHttpError(error);
        if (status >= 500) {
          this.log.error('api', 'Request failed', {
            path: req.path,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        res.status(status).json(body);
      }
    };
  }

  private setupRoutes(): void {
    const { profiles, achievements, events, catalog, marketplace, notifications, verifier, access } = this.platform;

    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        sequence: notifications.sequence,
        headHash: notifications.headHash,
        domain: verifier.domain,
        domainSeparator: verifier.domainSeparatorHex(),
        subscribers: this.stream.connectionCount,
      });
    });

    this.app.get('/metrics', (_req: Request, res: Response) => {
      res.type('text/plain; version=0.0.4').send(this.platform.metrics.render());
    });

    // ============================================================
    // RELAY: signed operations submitted on a user's behalf
    // ============================================================

    this.app.post(
      '/api/relay/register',
      this.route((req, res) => {
        const body = parseRegisterRelay(req.body);
        const relayer = firstQueryValue(req.headers['x-relayer']) ?? null;
        const profile = profiles.registerFor(body.account, body.deadline, body.signature, relayer);
        res.status(201).json({ success: true, account: body.account, profile });
      })
    );

    this.app.post(
      '/api/relay/stats',
      this.route((req, res) => {
        const body = parseStatsRelay(req.body);
        const result = profiles.updateStats(body.account, body.stats, body.deadline, body.signature);
        res.json({
          success: true,
          account: body.account,
          profile: result.profile,
          tier: tierName(result.tier),
          upgraded: result.upgraded,
        });
      })
    );

    this.app.post(
      '/api/relay/claim',
      this.route((req, res) => {
        const body = parseClaimRelay(req.body);
        const achievement = achievements.claim(
          body.to,
          body.eventId,
          body.tier,
          body.metadataHash,
          body.deadline,
          body.signature
        );
        res.status(201).json({ success: true, achievement });
      })
    );

    // ============================================================
    // READS
    // ============================================================

    this.app.get(
      '/api/profiles/:account',
      this.route((req, res) => {
        const { account } = req.params;
        const profile = profiles.getProfile(account);
        if (!profile) {
          res.status(404).json({ success: false, error: 'Profile not found', code: 'NotRegistered' });
          return;
        }
        const tier = profiles.tierOf(account);
        res.json({
          success: true,
          account,
          profile,
          tier: tier === undefined ? null : tierName(tier),
          nonces: verifier.noncesOf(account),
        });
      })
    );

    this.app.get(
      '/api/profiles/:account/nonces',
      this.route((req, res) => {
        res.json({ success: true, account: req.params.account, nonces: verifier.noncesOf(req.params.account) });
      })
    );

    this.app.get(
      '/api/profiles/:account/inventory',
      this.route((req, res) => {
        const { account } = req.params;
        const equipped: Record<string, string | null> = {};
        for (const category of COSMETIC_CATEGORIES) {
          equipped[category] = catalog.getEquipped(account, category) ?? null;
        }
        res.json({ success: true, account, holdings: catalog.inventoryOf(account), equipped });
      })
    );

    this.app.get(
      '/api/roles/:role',
      this.route((req, res) => {
        const role = parseRole(req.params.role);
        if (!role) throw new BadRequestError('role', `Unknown role: ${req.params.role}`);
        res.json({ success: true, role, members: access.membersOf(role) });
      })
    );

    this.app.get(
      '/api/achievements/:account',
      this.route((req, res) => {
        const list = achievements.listForAccount(req.params.account);
        res.json({ success: true, account: req.params.account, ...paginate(list, parsePagination(req.query)) });
      })
    );

    this.app.get(
      '/api/achievements/:account/:eventId',
      this.route((req, res) => {
        const achievement = achievements.getAchievement(req.params.account, req.params.eventId);
        if (!achievement) {
          res.status(404).json({ success: false, error: 'Achievement not found', code: 'NotFound' });
          return;
        }
        res.json({ success: true, achievement });
      })
    );

    this.app.get(
      '/api/events',
      this.route((req, res) => {
        res.json({ success: true, ...paginate(events.listEvents(), parsePagination(req.query)) });
      })
    );

    this.app.get(
      '/api/events/:id',
      this.route((req, res) => {
        const event = events.getEvent(req.params.id);
        if (!event) {
          res.status(404).json({ success: false, error: 'Event not found', code: 'EventNotFound' });
          return;
        }
        res.json({
          success: true,
          event,
          reward: events.getEventReward(event.id) ?? null,
          isActive: events.isEventActive(event.id),
        });
      })
    );

    this.app.get(
      '/api/items',
      this.route((req, res) => {
        res.json({ success: true, ...paginate(catalog.listItems(), parsePagination(req.query)) });
      })
    );

    this.app.get(
      '/api/items/:id',
      this.route((req, res) => {
        const item = catalog.getItem(req.params.id);
        if (!item) {
          res.status(404).json({ success: false, error: 'Item not found', code: 'ItemNotFound' });
          return;
        }
        res.json({ success: true, item });
      })
    );

    this.app.get(
      '/api/items/:id/listings',
      this.route((req, res) => {
        const listings = marketplace.listingsForItem(req.params.id);
        res.json({ success: true, ...paginate(listings, parsePagination(req.query)) });
      })
    );

    this.app.get(
      '/api/listings',
      this.route((req, res) => {
        const seller = firstQueryValue(req.query.seller);
        const listings = seller ? marketplace.listingsBySeller(seller) : marketplace.activeListings();
        res.json({
          success: true,
          platformFeeBps: marketplace.platformFeeBps,
          ...paginate(listings, parsePagination(req.query)),
        });
      })
    );

    this.app.get(
      '/api/listings/:id',
      this.route((req, res) => {
        const listing = marketplace.getListing(parseListingId(req.params.id));
        if (!listing) {
          res.status(404).json({ success: false, error: 'Listing not found', code: 'ListingNotFound' });
          return;
        }
        res.json({ success: true, listing });
      })
    );

    this.app.get(
      '/api/notifications',
      this.route((req, res) => {
        const after = parseInt(firstQueryValue(req.query.after) ?? '0', 10) || 0;
        const requested = parseInt(firstQueryValue(req.query.limit) ?? '', 10) || MAX_NOTIFICATIONS_PER_PAGE;
        const limit = Math.min(Math.max(1, requested), MAX_NOTIFICATIONS_PER_PAGE);
        const page = notifications.since(after, limit);
        res.json({
          success: true,
          sequence: notifications.sequence,
          headHash: notifications.headHash,
          notifications: page,
        });
      })
    );

    this.app.get(
      '/api/notifications/verify',
      this.route((_req, res) => {
        res.json({ success: true, ...notifications.verifyChain() });
      })
    );

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      // Body parser failures land here
      this.log.warn('api', 'Rejected request', { path: req.path });
      const { status, body } = toHttpError(
        err instanceof SyntaxError ? new BadRequestError('body', 'Malformed JSON body') : err
      );
      res.status(status).json(body);
    });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      this.httpServer = server;
      server.once('error', reject);
      server.listen(this.port, () => {
        this.stream.attach(server);
        this.log.info('api', 'Listening', { port: this.port });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    await this.stream.close();
    const server = this.httpServer;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.log.info('api', 'Stopped');
  }
}
