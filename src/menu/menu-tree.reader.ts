import type { IContentStep, IMenuNode, IMenuStorage } from '../app.interface';
import { MenuNodeNotFoundError } from '../errors';

export interface IMenuTreeEntry {
    node: IMenuNode;
    depth: number;
    /** Labels of the ancestors, root first. */
    path: string[];
    steps: IContentStep[];
}

/**
 * Textual rendering of each step: its text or caption, or the media kind in
 * brackets for captionless files.
 */
export const renderStepTexts = (steps: IContentStep[]): string[] =>
    steps.map((step) => step.text ?? `[${step.media?.kind ?? step.kind}]`);

export class MenuTreeReader {
    constructor(private readonly storage: IMenuStorage) {}

    public getChildren(parentId: number | null): Promise<IMenuNode[]> {
        return this.storage.listChildren(parentId);
    }

    public getNode(id: number): Promise<IMenuNode | undefined> {
        return this.storage.getNode(id);
    }

    public async requireNode(id: number): Promise<IMenuNode> {
        const node = await this.storage.getNode(id);
        if (!node) {
            throw new MenuNodeNotFoundError(id);
        }
        return node;
    }

    public getSteps(nodeId: number): Promise<IContentStep[]> {
        return this.storage.listSteps(nodeId);
    }

    public async getPath(nodeId: number): Promise<string[]> {
        const path: string[] = [];
        const visited = new Set<number>();
        let current = await this.storage.getNode(nodeId);

        while (current?.parentId != null && !visited.has(current.parentId)) {
            visited.add(current.parentId);
            current = await this.storage.getNode(current.parentId);
            if (current) {
                path.unshift(current.label);
            }
        }

        return path;
    }

    /**
     * Materializes the whole tree depth-first, children in creation order.
     * Parents always predate their children, so the walk cannot loop.
     */
    public async getTree(): Promise<IMenuTreeEntry[]> {
        const nodes = await this.storage.listNodes();
        const stepsByNode = await this.storage.listStepsForNodes(
            nodes.map((node) => node.id),
        );

        const childrenOf = new Map<number | null, IMenuNode[]>();
        for (const node of nodes) {
            const siblings = childrenOf.get(node.parentId) ?? [];
            siblings.push(node);
            childrenOf.set(node.parentId, siblings);
        }

        const entries: IMenuTreeEntry[] = [];
        const walk = (parentId: number | null, path: string[]): void => {
            for (const node of childrenOf.get(parentId) ?? []) {
                entries.push({
                    node,
                    depth: path.length,
                    path,
                    steps: stepsByNode.get(node.id) ?? [],
                });
                walk(node.id, [...path, node.label]);
            }
        };

        walk(null, []);
        return entries;
    }
}
