import { DEFAULT_WELCOME_MESSAGE } from '../app.constants';
import {
    IContentStep,
    IContentStepInput,
    IContentStepPatch,
    IMediaRef,
    IMenuNode,
    IMenuNodeInput,
    IMenuStorage,
} from '../app.interface';
import { MenuNodeNotFoundError } from '../errors';
import {
    buildNodeToken,
    clampInsertPosition,
    isExistingPosition,
    stepKindOf,
} from './storage.utils';

/**
 * In-process storage with the same cascade and position rules as the
 * relational driver. Every value handed out is a copy.
 */
export class MemoryStorage implements IMenuStorage {
    private readonly nodes = new Map<number, IMenuNode>();
    private readonly steps = new Map<number, IContentStep[]>();
    private welcomeMessage: string;
    private nodeIdSequence = 1;
    private stepIdSequence = 1;

    constructor(welcomeMessage: string = DEFAULT_WELCOME_MESSAGE) {
        this.welcomeMessage = welcomeMessage;
    }

    public async init(): Promise<void> {}

    public async close(): Promise<void> {}

    public async createNode(input: IMenuNodeInput): Promise<IMenuNode> {
        this.assertParentExists(input.parentId);
        return this.cloneNode(this.insertNode(input));
    }

    public async createNodeWithSteps(
        input: IMenuNodeInput,
        steps: IContentStepInput[],
    ): Promise<IMenuNode> {
        this.assertParentExists(input.parentId);

        const node = this.insertNode(input);
        for (const step of steps) {
            this.insertStepAt(node.id, Number.MAX_SAFE_INTEGER, step);
        }

        return this.cloneNode(node);
    }

    public async getNode(id: number): Promise<IMenuNode | undefined> {
        const node = this.nodes.get(id);
        return node ? this.cloneNode(node) : undefined;
    }

    public async listChildren(parentId: number | null): Promise<IMenuNode[]> {
        return this.sortedNodes()
            .filter((node) => node.parentId === parentId)
            .map((node) => this.cloneNode(node));
    }

    public async listNodes(): Promise<IMenuNode[]> {
        return this.sortedNodes().map((node) => this.cloneNode(node));
    }

    public async updateNodeLabel(id: number, label: string): Promise<boolean> {
        return this.patchNode(id, { label });
    }

    public async updateNodeBody(
        id: number,
        body: string | null,
    ): Promise<boolean> {
        return this.patchNode(id, { body });
    }

    public async setNodeMedia(
        id: number,
        media: IMediaRef | null,
    ): Promise<boolean> {
        return this.patchNode(id, { media: media ? { ...media } : null });
    }

    public async deleteNode(id: number): Promise<boolean> {
        if (!this.nodes.has(id)) {
            return false;
        }

        const pending = [id];
        while (pending.length > 0) {
            const current = pending.pop();
            if (current === undefined) {
                break;
            }

            for (const node of this.nodes.values()) {
                if (node.parentId === current) {
                    pending.push(node.id);
                }
            }

            this.nodes.delete(current);
            this.steps.delete(current);
        }

        return true;
    }

    public async listSteps(nodeId: number): Promise<IContentStep[]> {
        return (this.steps.get(nodeId) ?? []).map((step) =>
            this.cloneStep(step),
        );
    }

    public async listStepsForNodes(
        nodeIds: number[],
    ): Promise<Map<number, IContentStep[]>> {
        const result = new Map<number, IContentStep[]>();
        for (const nodeId of nodeIds) {
            result.set(nodeId, await this.listSteps(nodeId));
        }
        return result;
    }

    public async getStep(
        nodeId: number,
        position: number,
    ): Promise<IContentStep | undefined> {
        const step = this.findStep(nodeId, position);
        return step ? this.cloneStep(step) : undefined;
    }

    public async appendStep(
        nodeId: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined> {
        if (!this.nodes.has(nodeId)) {
            return undefined;
        }

        return this.cloneStep(
            this.insertStepAt(nodeId, Number.MAX_SAFE_INTEGER, step),
        );
    }

    public async insertStep(
        nodeId: number,
        position: number,
        step: IContentStepInput,
    ): Promise<IContentStep | undefined> {
        if (!this.nodes.has(nodeId)) {
            return undefined;
        }

        return this.cloneStep(this.insertStepAt(nodeId, position, step));
    }

    public async updateStepContent(
        nodeId: number,
        position: number,
        patch: IContentStepPatch,
    ): Promise<boolean> {
        const step = this.findStep(nodeId, position);
        if (!step) {
            return false;
        }

        step.text = patch.text;
        step.media = patch.media ? { ...patch.media } : null;
        step.kind = stepKindOf(step.media);
        return true;
    }

    public async updateStepDelay(
        nodeId: number,
        position: number,
        delay: number,
    ): Promise<boolean> {
        const step = this.findStep(nodeId, position);
        if (!step) {
            return false;
        }

        step.delay = delay;
        return true;
    }

    public async deleteStep(nodeId: number, position: number): Promise<boolean> {
        const list = this.steps.get(nodeId);
        if (!list || !isExistingPosition(position, list.length)) {
            return false;
        }

        list.splice(position - 1, 1);
        this.renumber(list);
        return true;
    }

    public async moveStep(
        nodeId: number,
        from: number,
        to: number,
    ): Promise<boolean> {
        const list = this.steps.get(nodeId);
        if (
            !list ||
            !isExistingPosition(from, list.length) ||
            !isExistingPosition(to, list.length)
        ) {
            return false;
        }

        const [moved] = list.splice(from - 1, 1);
        if (!moved) {
            return false;
        }

        list.splice(to - 1, 0, moved);
        this.renumber(list);
        return true;
    }

    public async getWelcomeMessage(): Promise<string> {
        return this.welcomeMessage;
    }

    public async setWelcomeMessage(text: string): Promise<void> {
        this.welcomeMessage = text;
    }

    private insertNode(input: IMenuNodeInput): IMenuNode {
        const id = this.nodeIdSequence++;
        const node: IMenuNode = {
            id,
            label: input.label,
            callbackToken: buildNodeToken(id),
            body: input.body ?? null,
            parentId: input.parentId,
            media: input.media ? { ...input.media } : null,
            delay: 0,
            createdAt: new Date(),
        };

        this.nodes.set(id, node);
        return node;
    }

    private insertStepAt(
        nodeId: number,
        position: number,
        input: IContentStepInput,
    ): IContentStep {
        const list = this.steps.get(nodeId) ?? [];
        const target = clampInsertPosition(position, list.length);
        const media = input.media ? { ...input.media } : null;
        const step: IContentStep = {
            id: this.stepIdSequence++,
            nodeId,
            position: target,
            kind: stepKindOf(media),
            text: input.text,
            media,
            delay: input.delay,
            createdAt: new Date(),
        };

        list.splice(target - 1, 0, step);
        this.renumber(list);
        this.steps.set(nodeId, list);
        return step;
    }

    private assertParentExists(parentId: number | null): void {
        if (parentId !== null && !this.nodes.has(parentId)) {
            throw new MenuNodeNotFoundError(parentId);
        }
    }

    private patchNode(id: number, patch: Partial<IMenuNode>): boolean {
        const node = this.nodes.get(id);
        if (!node) {
            return false;
        }

        this.nodes.set(id, { ...node, ...patch });
        return true;
    }

    private findStep(nodeId: number, position: number): IContentStep | undefined {
        return this.steps
            .get(nodeId)
            ?.find((step) => step.position === position);
    }

    private renumber(list: IContentStep[]): void {
        list.forEach((step, index) => {
            step.position = index + 1;
        });
    }

    private sortedNodes(): IMenuNode[] {
        return [...this.nodes.values()].sort((a, b) => a.id - b.id);
    }

    private cloneNode(node: IMenuNode): IMenuNode {
        return structuredClone(node);
    }

    private cloneStep(step: IContentStep): IContentStep {
        return structuredClone(step);
    }
}
