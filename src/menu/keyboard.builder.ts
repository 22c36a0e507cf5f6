import type TelegramBot from 'node-telegram-bot-api';
import type {
    IContentStep,
    IMenuNode,
    TViewerMode,
} from '../app.interface';
import type { TAuthoringStage, TWizardAction } from '../authoring/authoring.state';
import type { IMenuBotMessages } from '../bot/bot.messages';
import { TMenuCommand, toCallbackData } from './callback-token';
import { renderStepTexts } from './menu-tree.reader';

export interface IViewer {
    isAdmin: boolean;
    mode: TViewerMode;
}

const STEP_PREVIEW_LENGTH = 20;

type TButton = TelegramBot.InlineKeyboardButton;

const WIZARD_LAYOUT: {
    [K in TAuthoringStage['kind']]: (
        stage: Extract<TAuthoringStage, { kind: K }>,
    ) => TWizardAction[];
} = {
    awaitingLabel: () => ['cancel'],
    awaitingStepContent: (stage) =>
        stage.draft.steps.length > 0
            ? ['finish', 'back', 'cancel']
            : ['back', 'cancel'],
    awaitingFileCaption: () => ['skipCaption', 'back', 'cancel'],
    awaitingFinalization: () => ['addStep', 'setDelay', 'finish', 'back', 'cancel'],
    awaitingDelayValue: () => ['back', 'cancel'],
    awaitingNewLabel: () => ['cancel'],
    awaitingNodeBody: () => ['cancel'],
    awaitingNodeMedia: () => ['cancel'],
    awaitingWelcomeText: () => ['cancel'],
    awaitingNewStepContent: () => ['cancel'],
    awaitingNewStepCaption: () => ['skipCaption', 'back', 'cancel'],
    awaitingStepPosition: () => ['back', 'cancel'],
    awaitingPositionConfirm: () => ['confirm', 'back', 'cancel'],
    awaitingStepReplacement: () => ['cancel'],
    awaitingStepDelay: () => ['cancel'],
    awaitingMoveTarget: () => ['cancel'],
};

const wizardActionsFor = <K extends TAuthoringStage['kind']>(
    kind: K,
    stage: Extract<TAuthoringStage, { kind: K }>,
): TWizardAction[] => WIZARD_LAYOUT[kind](stage);

const truncate = (value: string, length: number): string =>
    value.length > length ? `${value.slice(0, length - 1)}…` : value;

/**
 * Renders inline keyboards as a single column of buttons. Every callback
 * token goes through `toCallbackData`, which keeps it inside the platform
 * limit.
 */
export class KeyboardBuilder {
    constructor(private readonly messages: IMenuBotMessages) {}

    public rootKeyboard(
        children: IMenuNode[],
        viewer: IViewer,
    ): TelegramBot.InlineKeyboardMarkup {
        const rows = children.map((child) => this.nodeRow(child));

        if (this.showsAdminControls(viewer)) {
            rows.push(
                this.row(this.messages.buttonAddRoot(), {
                    tag: 'addNode',
                    parentId: null,
                }),
                this.row(this.messages.buttonEditWelcome(), { tag: 'editWelcome' }),
            );
        }

        rows.push(
            this.row(this.messages.buttonSearch(), { tag: 'search' }),
            this.row(this.messages.buttonFeedback(), { tag: 'feedback' }),
        );

        if (viewer.isAdmin) {
            rows.push(this.modeToggleRow(viewer));
        }

        return { inline_keyboard: rows };
    }

    public nodeKeyboard(
        node: IMenuNode,
        children: IMenuNode[],
        viewer: IViewer,
    ): TelegramBot.InlineKeyboardMarkup {
        const rows = children.map((child) => this.nodeRow(child));
        const nodeId = node.id;

        if (this.showsAdminControls(viewer)) {
            rows.push(
                this.row(this.messages.buttonAddChild(), {
                    tag: 'addNode',
                    parentId: nodeId,
                }),
                this.row(this.messages.buttonRename(), { tag: 'renameNode', nodeId }),
                this.row(this.messages.buttonEditBody(), { tag: 'editBody', nodeId }),
                this.row(this.messages.buttonEditSteps(), { tag: 'editSteps', nodeId }),
                node.media
                    ? this.row(this.messages.buttonDetachMedia(), {
                          tag: 'detachMedia',
                          nodeId,
                      })
                    : this.row(this.messages.buttonAttachMedia(), {
                          tag: 'attachMedia',
                          nodeId,
                      }),
                this.row(this.messages.buttonDelete(), { tag: 'deleteNode', nodeId }),
            );
        }

        rows.push(
            this.row(this.messages.buttonSearch(), { tag: 'search' }),
            this.row(this.messages.buttonFeedback(), { tag: 'feedback' }),
            this.backRow(node.parentId),
        );

        return { inline_keyboard: rows };
    }

    /** One row per step with edit, delay, move and delete controls. */
    public stepEditorKeyboard(
        node: IMenuNode,
        steps: IContentStep[],
    ): TelegramBot.InlineKeyboardMarkup {
        const previews = renderStepTexts(steps);
        const rows: TButton[][] = steps.map((step, index) => {
            const payload = { nodeId: node.id, position: step.position };
            return [
                this.button(
                    this.messages.buttonStepEdit({
                        position: step.position,
                        preview: truncate(previews[index] ?? '', STEP_PREVIEW_LENGTH),
                    }),
                    { tag: 'editStep', ...payload },
                ),
                this.button(this.messages.buttonStepDelay({ delay: step.delay }), {
                    tag: 'editStepDelay',
                    ...payload,
                }),
                this.button(this.messages.buttonStepMove(), {
                    tag: 'moveStep',
                    ...payload,
                }),
                this.button(this.messages.buttonStepDelete(), {
                    tag: 'deleteStep',
                    ...payload,
                }),
            ];
        });

        rows.push(
            this.row(this.messages.buttonInsertStep(), {
                tag: 'insertStep',
                nodeId: node.id,
            }),
            this.row(this.messages.buttonBack(), { tag: 'open', nodeId: node.id }),
        );

        return { inline_keyboard: rows };
    }

    public wizardKeyboard(stage: TAuthoringStage): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: wizardActionsFor(stage.kind, stage).map((action) =>
                this.row(this.wizardLabel(action), { tag: 'wizard', action }),
            ),
        };
    }

    public deleteConfirmKeyboard(node: IMenuNode): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: [
                this.row(this.messages.buttonConfirmDelete(), {
                    tag: 'confirmDelete',
                    nodeId: node.id,
                }),
                this.row(this.messages.buttonBack(), { tag: 'open', nodeId: node.id }),
            ],
        };
    }

    public searchResultsKeyboard(nodes: IMenuNode[]): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: [
                ...nodes.map((node) => this.nodeRow(node)),
                this.row(this.messages.buttonHome(), { tag: 'home' }),
            ],
        };
    }

    public homeKeyboard(): TelegramBot.InlineKeyboardMarkup {
        return {
            inline_keyboard: [this.row(this.messages.buttonHome(), { tag: 'home' })],
        };
    }

    private showsAdminControls(viewer: IViewer): boolean {
        return viewer.isAdmin && viewer.mode === 'admin';
    }

    private modeToggleRow(viewer: IViewer): TButton[] {
        return this.row(
            viewer.mode === 'admin'
                ? this.messages.buttonUserMode()
                : this.messages.buttonAdminMode(),
            { tag: 'toggleMode' },
        );
    }

    private backRow(parentId: number | null): TButton[] {
        return this.row(
            this.messages.buttonBack(),
            parentId === null ? { tag: 'home' } : { tag: 'open', nodeId: parentId },
        );
    }

    private nodeRow(node: IMenuNode): TButton[] {
        return this.row(node.label, { tag: 'open', nodeId: node.id });
    }

    private wizardLabel(action: TWizardAction): string {
        switch (action) {
            case 'addStep':
                return this.messages.wizardAddStep();
            case 'setDelay':
                return this.messages.wizardSetDelay();
            case 'finish':
                return this.messages.wizardFinish();
            case 'back':
                return this.messages.wizardBack();
            case 'cancel':
                return this.messages.wizardCancel();
            case 'skipCaption':
                return this.messages.wizardSkipCaption();
            case 'confirm':
                return this.messages.wizardConfirm();
        }
    }

    private row(text: string, command: TMenuCommand): TButton[] {
        return [this.button(text, command)];
    }

    private button(text: string, command: TMenuCommand): TButton {
        return { text, callback_data: toCallbackData(command) };
    }
}
