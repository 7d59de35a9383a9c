import { ok, err, type Result } from '../../domain/result.js';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import { isKnownProcessoFormat, normalizeProcesso, processoKey } from '../../domain/processo.js';
import type {
  CompanyDiscovery,
  CompanyRecord,
  NavigationPath,
  NavigationState,
  ProcessoLink,
  SkippedBranch,
} from '../../domain/types.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import { canTransition, type PortalAdapter, type RawLink } from './types.js';

export interface NavigatorOptions {
  filterYear: number;
  log?: Logger;
}

/** Hierarchy below the company: organ, then unit, then object. */
type NodePath = readonly string[];

/** Listing under a node that vanished between listing and re-entry. */
const ABSENT = null;

function isAbsent(error: AppError): boolean {
  return error.code === ErrorCode.PORTAL_NODE_ABSENT;
}

function emptyPath(company: CompanyRecord, nodePath: NodePath): NavigationPath {
  const [organ = '', unit = null, object = null] = nodePath;
  return { company_id: company.company_id, organ, unit, object, links: [] };
}

/**
 * Tracks the navigation state machine over one portal session. Illegal transitions are
 * programming errors and throw.
 */
export class NavigationSession {
  private current: NavigationState = 'INIT';
  readonly history: NavigationState[] = ['INIT'];

  constructor(private readonly portal: PortalAdapter) {}

  get state(): NavigationState {
    return this.current;
  }

  private move(to: NavigationState): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal navigation transition ${this.current} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
  }

  async reset(): Promise<Result<void, AppError>> {
    this.move('RESET');
    const result = await this.portal.reset();
    if (!result.ok) return result;
    this.move('INIT');
    return ok(undefined);
  }

  async filter(year: number): Promise<Result<void, AppError>> {
    return this.step('FILTERED', () => this.portal.applyFilter(year));
  }

  async selectCompany(company: CompanyRecord): Promise<Result<void, AppError>> {
    return this.step('COMPANY_SELECTED', () => this.portal.selectCompany(company));
  }

  async selectOrgan(name: string): Promise<Result<void, AppError>> {
    return this.step('ORGAN_SELECTED', () => this.portal.selectOrgan(name));
  }

  async selectUnit(name: string): Promise<Result<void, AppError>> {
    return this.step('UNIT_SELECTED', () => this.portal.selectUnit(name));
  }

  async selectObject(name: string): Promise<Result<void, AppError>> {
    return this.step('UNIT_SELECTED', () => this.portal.selectObject(name));
  }

  async collect(): Promise<Result<RawLink[], AppError>> {
    const links = await this.portal.collectLinks();
    if (!links.ok) return links;
    this.move('LEAF_COLLECTED');
    return links;
  }

  private async step(
    to: NavigationState,
    action: () => Promise<Result<void, AppError>>,
  ): Promise<Result<void, AppError>> {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal navigation transition ${this.current} -> ${to}`);
    }
    const acted = await action();
    if (!acted.ok) return acted;
    const settled = await this.portal.waitForSettle();
    if (!settled.ok) return settled;
    this.move(to);
    return ok(undefined);
  }
}

/**
 * Walks company -> organ -> unit -> object for one company and returns every processo link
 * reached. Each branch and each leaf re-enters from a reset portal along its own node path,
 * so no selection made in a sibling branch can leak into it. A branch that fails is retried
 * once and then skipped; the other branches still run.
 */
export class PathDiscoveryNavigator {
  private readonly session: NavigationSession;
  private readonly log: Logger;

  constructor(
    private readonly portal: PortalAdapter,
    private readonly options: NavigatorOptions,
  ) {
    this.session = new NavigationSession(portal);
    this.log = (options.log ?? logger).child({ module: 'navigator' });
  }

  get state(): NavigationState {
    return this.session.state;
  }

  async discover(company: CompanyRecord): Promise<Result<CompanyDiscovery, AppError>> {
    const log = this.log.child({ companyId: company.company_id });

    const organs = await this.withOneRetry(() => this.listAt(company, [], () => this.portal.listOrgans()), log);
    if (!organs.ok) return err(this.atState(organs.error));

    const paths: NavigationPath[] = [];
    const skippedBranches: SkippedBranch[] = [];

    if (organs.value === ABSENT) {
      log.info('Company not shown by the portal, recording an empty path');
      paths.push(emptyPath(company, []));
    } else if (organs.value.length === 0) {
      const leaf = await this.withOneRetry(() => this.collectLeaf(company, []), log);
      if (!leaf.ok) return err(this.atState(leaf.error));
      paths.push(leaf.value);
    }

    for (const organ of organs.value ?? []) {
      const branchPaths: NavigationPath[] = [];
      const branch = await this.withOneRetry(async () => {
        branchPaths.length = 0;
        return this.discoverBranch(company, organ, branchPaths);
      }, log.child({ organ }));

      paths.push(...branchPaths);
      if (!branch.ok) {
        const error = this.atState(branch.error);
        log.warn(
          { organ, state: error.state, errorCode: error.code, retryable: error.retryable, keptLinks: countLinks(branchPaths) },
          'Skipping organ branch',
        );
        skippedBranches.push({ company_id: company.company_id, organ, state: this.session.state, error });
      }
    }

    const reset = await this.session.reset();
    if (!reset.ok) log.warn({ errorCode: reset.error.code }, 'Portal reset after company failed');

    const links = dedupeLinks(paths.flatMap((p) => p.links), company, log);
    log.info(
      { organs: organs.value?.length ?? 0, paths: paths.length, links: links.length, skippedBranches: skippedBranches.length },
      'Company discovery finished',
    );
    return ok({ company, paths, links, skippedBranches });
  }

  private async discoverBranch(
    company: CompanyRecord,
    organ: string,
    out: NavigationPath[],
  ): Promise<Result<void, AppError>> {
    const units = await this.listAt(company, [organ], () => this.portal.listUnits());
    if (!units.ok) return units;
    if (units.value === ABSENT) {
      out.push(emptyPath(company, [organ]));
      return ok(undefined);
    }

    if (units.value.length === 0) {
      const leaf = await this.collectLeaf(company, [organ]);
      if (!leaf.ok) return leaf;
      out.push(leaf.value);
      return ok(undefined);
    }

    for (const unit of units.value) {
      const objects = await this.listAt(company, [organ, unit], () => this.portal.listObjects());
      if (!objects.ok) return objects;
      if (objects.value === ABSENT) {
        out.push(emptyPath(company, [organ, unit]));
        continue;
      }

      const leafPaths: NodePath[] = objects.value.length === 0
        ? [[organ, unit]]
        : objects.value.map((object) => [organ, unit, object]);

      for (const nodePath of leafPaths) {
        const leaf = await this.collectLeaf(company, nodePath);
        if (!leaf.ok) return leaf;
        out.push(leaf.value);
      }
    }
    return ok(undefined);
  }

  /** Reset, filter, select the company and walk `nodePath`. */
  private async enter(company: CompanyRecord, nodePath: NodePath): Promise<Result<void, AppError>> {
    const steps: Array<() => Promise<Result<void, AppError>>> = [
      () => this.session.reset(),
      () => this.session.filter(this.options.filterYear),
      () => this.session.selectCompany(company),
    ];
    const [organ, unit, object] = nodePath;
    if (organ !== undefined) steps.push(() => this.session.selectOrgan(organ));
    if (unit !== undefined) steps.push(() => this.session.selectUnit(unit));
    if (object !== undefined) steps.push(() => this.session.selectObject(object));

    for (const step of steps) {
      const result = await step();
      if (!result.ok) return result;
    }
    return ok(undefined);
  }

  /** Names one level below `nodePath`; ABSENT when the node itself is no longer there. */
  private async listAt(
    company: CompanyRecord,
    nodePath: NodePath,
    list: () => Promise<Result<string[], AppError>>,
  ): Promise<Result<string[] | typeof ABSENT, AppError>> {
    const entered = await this.enter(company, nodePath);
    if (!entered.ok) return this.absentOr(entered.error, nodePath);
    const names = await list();
    if (!names.ok) return names;
    return ok([...new Set(names.value.map((n) => n.trim()).filter(Boolean))]);
  }

  private async collectLeaf(company: CompanyRecord, nodePath: NodePath): Promise<Result<NavigationPath, AppError>> {
    const entered = await this.enter(company, nodePath);
    if (!entered.ok) {
      const absent = this.absentOr(entered.error, nodePath);
      return absent.ok ? ok(emptyPath(company, nodePath)) : absent;
    }
    const raw = await this.session.collect();
    if (!raw.ok) return raw;

    return ok({
      ...emptyPath(company, nodePath),
      links: toProcessoLinks(raw.value, company, [...nodePath], this.log),
    });
  }

  private absentOr(error: AppError, nodePath: NodePath): Result<typeof ABSENT, AppError> {
    if (!isAbsent(error)) return err(error);
    this.log.info({ nodePath, state: this.session.state }, 'Portal entry gone on re-entry, treating it as empty');
    return ok(ABSENT);
  }

  private async withOneRetry<T>(
    fn: () => Promise<Result<T, AppError>>,
    log: Logger,
  ): Promise<Result<T, AppError>> {
    const first = await fn();
    if (first.ok || !first.error.retryable) return first;
    log.warn({ state: this.session.state, errorCode: first.error.code }, 'Navigation step failed, retrying once');
    return fn();
  }

  private atState(error: AppError): AppError {
    return error.state === undefined ? { ...error, state: this.session.state } : error;
  }
}

function toProcessoLinks(raw: RawLink[], company: CompanyRecord, path: string[], log: Logger): ProcessoLink[] {
  const links: ProcessoLink[] = [];
  for (const link of raw) {
    const text = link.text.trim();
    if (text === '' || link.href === '') continue;
    if (!isKnownProcessoFormat(text)) {
      log.debug({ companyId: company.company_id, text }, 'Ignoring link that is not a processo');
      continue;
    }
    if (link.companyId !== undefined && link.companyId !== company.company_id) {
      log.warn({ companyId: company.company_id, foreignCompanyId: link.companyId, processo: text }, 'Dropping link of another company');
      continue;
    }
    links.push({
      processo: normalizeProcesso(text),
      url: link.href,
      company_id: company.company_id,
      company_name: company.name,
      path,
    });
  }
  return links;
}

function dedupeLinks(links: ProcessoLink[], company: CompanyRecord, log: Logger): ProcessoLink[] {
  const byKey = new Map<string, ProcessoLink>();
  for (const link of links) {
    if (link.company_id !== company.company_id) continue;
    const key = processoKey(link.processo);
    if (!byKey.has(key)) byKey.set(key, link);
  }
  if (byKey.size < links.length) {
    log.debug({ duplicates: links.length - byKey.size }, 'Duplicate processo links merged');
  }
  return [...byKey.values()];
}

function countLinks(paths: NavigationPath[]): number {
  return paths.reduce((n, p) => n + p.links.length, 0);
}

export async function discoverProcessoLinks(
  portal: PortalAdapter,
  company: CompanyRecord,
  options: NavigatorOptions,
): Promise<Result<CompanyDiscovery, AppError>> {
  return new PathDiscoveryNavigator(portal, options).discover(company);
}
