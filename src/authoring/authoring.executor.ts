import type { IMenuNode, IMenuStorage } from '../app.interface';
import { ContentStepNotFoundError, MenuNodeNotFoundError } from '../errors';
import type { TAuthoringCommit } from './authoring.state';

type TCommitOf<K extends TAuthoringCommit['kind']> = Extract<
    TAuthoringCommit,
    { kind: K }
>;

/**
 * Applies finished authoring conversations to storage. Commits aimed at a node
 * or step that disappeared meanwhile throw the matching not-found error.
 */
export class AuthoringExecutor {
    private readonly handlers: {
        [K in TAuthoringCommit['kind']]: (commit: TCommitOf<K>) => Promise<void>;
    } = {
        createNode: async (commit) => {
            await this.storage.createNodeWithSteps(
                { label: commit.label, parentId: commit.parentId },
                commit.steps,
            );
        },
        renameNode: async (commit) => {
            this.assertNode(
                commit.nodeId,
                await this.storage.updateNodeLabel(commit.nodeId, commit.label),
            );
        },
        updateBody: async (commit) => {
            this.assertNode(
                commit.nodeId,
                await this.storage.updateNodeBody(commit.nodeId, commit.body),
            );
        },
        attachMedia: async (commit) => {
            this.assertNode(
                commit.nodeId,
                await this.storage.setNodeMedia(commit.nodeId, commit.media),
            );
        },
        updateWelcome: async (commit) => {
            await this.storage.setWelcomeMessage(commit.text);
        },
        insertStep: async (commit) => {
            const inserted = await this.storage.insertStep(
                commit.nodeId,
                commit.position,
                { ...commit.step, delay: 0 },
            );
            if (!inserted) {
                throw new MenuNodeNotFoundError(commit.nodeId);
            }
        },
        replaceStepContent: async (commit) => {
            this.assertStep(
                commit.nodeId,
                commit.position,
                await this.storage.updateStepContent(
                    commit.nodeId,
                    commit.position,
                    commit.step,
                ),
            );
        },
        updateStepDelay: async (commit) => {
            this.assertStep(
                commit.nodeId,
                commit.position,
                await this.storage.updateStepDelay(
                    commit.nodeId,
                    commit.position,
                    commit.delay,
                ),
            );
        },
        moveStep: async (commit) => {
            this.assertStep(
                commit.nodeId,
                commit.from,
                await this.storage.moveStep(commit.nodeId, commit.from, commit.to),
            );
        },
    };

    constructor(private readonly storage: IMenuStorage) {}

    public apply(commit: TAuthoringCommit): Promise<void> {
        return this.run(commit.kind, commit);
    }

    /** Deletes a node with its subtree and returns what was removed. */
    public async deleteNode(nodeId: number): Promise<IMenuNode> {
        const node = await this.storage.getNode(nodeId);
        if (!node || !(await this.storage.deleteNode(nodeId))) {
            throw new MenuNodeNotFoundError(nodeId);
        }
        return node;
    }

    public async detachMedia(nodeId: number): Promise<void> {
        this.assertNode(nodeId, await this.storage.setNodeMedia(nodeId, null));
    }

    public async deleteStep(nodeId: number, position: number): Promise<void> {
        this.assertStep(
            nodeId,
            position,
            await this.storage.deleteStep(nodeId, position),
        );
    }

    private run<K extends TAuthoringCommit['kind']>(
        kind: K,
        commit: TCommitOf<K>,
    ): Promise<void> {
        return this.handlers[kind](commit);
    }

    private assertNode(nodeId: number, found: boolean): void {
        if (!found) {
            throw new MenuNodeNotFoundError(nodeId);
        }
    }

    private assertStep(nodeId: number, position: number, found: boolean): void {
        if (!found) {
            throw new ContentStepNotFoundError(nodeId, position);
        }
    }
}
