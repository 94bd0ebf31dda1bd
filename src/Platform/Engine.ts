import type { Hash } from '../kernel-core/L0/Ontology.js';
import { PolicyGuard } from '../kernel-core/L0/PolicyGuard.js';
import { Vault } from '../kernel-core/L2/Vault.js';
import { GraphKernel } from '../kernel-core/Kernel.js';
import { Orchestrator } from '../kernel-core/L4/Orchestrator.js';
import { ensureGenesis } from '../kernel-core/L5/Genesis.js';
import { Optimizer } from '../kernel-core/L5/Optimizer.js';
import type { IBlobStore, IFetcher, IKeyValueStore, ILoom, IManifestSource, ISystemClock } from './Ports.js';
import type { EngineConfig } from './Config.js';
import { SQLiteKeyStore } from '../infrastructure/persistence/SQLiteKeyStore.js';
import { LocalBlobStore } from '../infrastructure/blob/LocalBlobStore.js';
import { HttpFetcher } from '../infrastructure/io/HttpFetcher.js';
import { FileManifestSource } from '../infrastructure/io/FileManifestSource.js';
import { HeuristicLoom } from '../infrastructure/loom/HeuristicLoom.js';

export interface EnginePorts {
    store: IKeyValueStore;
    blobs: IBlobStore;
    fetcher: IFetcher;
    manifests: IManifestSource;
    loom?: ILoom;
    clock?: ISystemClock;
}

/**
 * Engine: the wired core. Products and the API call this;
 * nothing outside Platform constructs kernel components directly.
 */
export class Engine {
    public readonly vault: Vault;
    public readonly guard: PolicyGuard;
    public readonly kernel: GraphKernel;
    public readonly orchestrator: Orchestrator;
    public readonly optimizer: Optimizer;
    public readonly loom: ILoom;
    private registry: ReadonlyMap<string, Hash> = new Map();

    constructor(ports: EnginePorts, config: Pick<EngineConfig, 'sovereignSuffixes' | 'optimizerThresholdNs'>) {
        this.vault = new Vault(ports.store, ports.blobs, ports.clock);
        this.guard = new PolicyGuard(config.sovereignSuffixes);
        this.loom = ports.loom ?? new HeuristicLoom(ports.blobs);
        this.kernel = new GraphKernel(this.vault, ports.fetcher);
        this.orchestrator = new Orchestrator(this.vault, this.guard, this.loom, ports.manifests);
        this.optimizer = new Optimizer(config.optimizerThresholdNs, this.loom);
    }

    /** Seeds the genesis catalogue; returns name -> hash. */
    public async boot(): Promise<ReadonlyMap<string, Hash>> {
        this.registry = await ensureGenesis(this.vault);
        return this.registry;
    }

    public get Registry(): ReadonlyMap<string, Hash> { return this.registry; }

    public static fromConfig(config: EngineConfig): Engine {
        return new Engine({
            store: new SQLiteKeyStore(config.vaultDbPath),
            blobs: new LocalBlobStore(config.blobDir),
            fetcher: new HttpFetcher(),
            manifests: new FileManifestSource(config.manifestDir),
        }, config);
    }
}
