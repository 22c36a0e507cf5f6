import { MenuNodeNotFoundError } from '../../src/errors';
import { MenuTreeReader, renderStepTexts } from '../../src/menu/menu-tree.reader';
import { seedTree, textStep } from '../factories/menu';

describe('MenuTreeReader', () => {
    it('walks the tree depth-first with ancestor paths', async () => {
        const { storage } = await seedTree();
        const reader = new MenuTreeReader(storage);

        const entries = await reader.getTree();

        expect(
            entries.map((entry) => [entry.node.label, entry.depth, entry.path]),
        ).toEqual([
            ['About', 0, []],
            ['Contacts', 0, []],
            ['Office', 1, ['Contacts']],
        ]);
        expect(entries[0]?.steps.map((step) => step.text)).toEqual([
            'We make menus',
            'Since 2020',
        ]);
        expect(entries[2]?.steps).toEqual([]);
    });

    it('resolves the ancestor labels of a node', async () => {
        const { storage, office } = await seedTree();
        const desk = await storage.createNode({ label: 'Desk', parentId: office.id });
        const reader = new MenuTreeReader(storage);

        await expect(reader.getPath(desk.id)).resolves.toEqual(['Contacts', 'Office']);
        await expect(reader.getPath(1)).resolves.toEqual([]);
    });

    it('throws for a missing node', async () => {
        const { storage } = await seedTree();
        const reader = new MenuTreeReader(storage);

        await expect(reader.requireNode(99)).rejects.toBeInstanceOf(MenuNodeNotFoundError);
    });

    it('renders captionless files by their kind', async () => {
        const { storage, about } = await seedTree();
        await storage.appendStep(about.id, {
            text: null,
            media: { fileId: 'voice-1', kind: 'voice' },
            delay: 0,
        });
        await storage.appendStep(about.id, textStep('Bye'));

        const texts = renderStepTexts(await storage.listSteps(about.id));

        expect(texts).toEqual(['We make menus', 'Since 2020', '[voice]', 'Bye']);
    });
});
