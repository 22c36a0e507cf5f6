import {
    MAX_LABEL_LENGTH,
    MAX_STEP_DELAY,
    MIN_STEP_DELAY,
} from '../app.constants';
import type { TMenuBotEvent } from '../app.interface';
import type {
    TAuthoringCommit,
    TAuthoringStage,
    TRejectionReason,
} from '../authoring/authoring.state';

const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

export interface IMenuBotMessages {
    // log lines
    runtimeInitialized(params: { adminCount: number }): string;
    pollingStarted(): string;
    pollingError(params: { error: unknown }): string;
    updateHandlingError(params: { event: TMenuBotEvent; error: unknown }): string;
    mediaDeliveryFailed(params: {
        nodeId: number;
        fileId: string;
        error: unknown;
    }): string;
    feedbackRelayFailed(params: { chatId: string | number; error: unknown }): string;
    chatActionFailed(params: { error: unknown }): string;
    callbackAnswerFailed(params: { error: unknown }): string;
    authoringCommitFailed(params: { kind: string; error: unknown }): string;
    searchFailed(params: { error: unknown }): string;

    // buttons
    buttonSearch(): string;
    buttonFeedback(): string;
    buttonBack(): string;
    buttonHome(): string;
    buttonAddRoot(): string;
    buttonAddChild(): string;
    buttonRename(): string;
    buttonEditBody(): string;
    buttonEditSteps(): string;
    buttonAttachMedia(): string;
    buttonDetachMedia(): string;
    buttonDelete(): string;
    buttonConfirmDelete(): string;
    buttonEditWelcome(): string;
    buttonUserMode(): string;
    buttonAdminMode(): string;
    buttonInsertStep(): string;
    buttonStepEdit(params: { position: number; preview: string }): string;
    buttonStepDelay(params: { delay: number }): string;
    buttonStepMove(): string;
    buttonStepDelete(): string;
    wizardAddStep(): string;
    wizardSetDelay(): string;
    wizardFinish(): string;
    wizardBack(): string;
    wizardCancel(): string;
    wizardSkipCaption(): string;
    wizardConfirm(): string;

    // chat texts
    userIdInfo(params: { userId: number; username?: string }): string;
    stagePrompt(stage: TAuthoringStage): string;
    rejection(reason: TRejectionReason): string;
    authoringCommitted(commit: TAuthoringCommit): string;
    authoringCancelled(): string;
    adminOnly(): string;
    staleButton(): string;
    nodeNotFound(): string;
    stepNotFound(): string;
    genericError(): string;
    adminModeEnabled(): string;
    userModeEnabled(): string;
    deleteConfirm(params: { label: string; path: string[] }): string;
    nodeDeleted(params: { label: string }): string;
    mediaDetached(): string;
    stepDeleted(params: { position: number }): string;
    stepsOverview(params: { label: string; steps: string[] }): string;
    mediaUnavailable(): string;
    searchPrompt(): string;
    searchQueryTooShort(params: { min: number }): string;
    searchNotMeaningful(): string;
    searchNoMatches(): string;
    searchResultsHeader(params: { count: number }): string;
    searchResultLine(params: {
        index: number;
        label: string;
        parentLabel?: string;
    }): string;
    searchMoreResults(params: { count: number }): string;
    searchUnavailable(): string;
    searchFailedReply(params: { status?: number }): string;
    feedbackPrompt(): string;
    feedbackThanks(): string;
    feedbackUnavailable(): string;
    feedbackNotDelivered(): string;
    feedbackHeader(params: {
        userId?: number;
        username?: string;
        fullName: string;
        chatId: number | string;
        chatType: string;
    }): string;
}

const STAGE_PROMPTS: {
    [K in TAuthoringStage['kind']]: (
        stage: Extract<TAuthoringStage, { kind: K }>,
    ) => string;
} = {
    awaitingLabel: () =>
        `Send the name of the new button (up to ${MAX_LABEL_LENGTH} characters).`,
    awaitingStepContent: (stage) =>
        stage.draft.steps.length === 0
            ? `"${stage.draft.label}": send the first step, text or a single file.`
            : `"${stage.draft.label}": send the next step, text or a single file.`,
    awaitingFileCaption: () =>
        'Send a caption for this file, or skip it.',
    awaitingFinalization: (stage) => {
        const lines = [
            `"${stage.draft.label}" has ${stage.draft.steps.length} step(s).`,
        ];
        if (stage.draft.pendingDelay > 0) {
            lines.push(
                `The next step will be sent after ${stage.draft.pendingDelay} s.`,
            );
        }
        lines.push('Add another step, set a delay for it, or finish.');
        return lines.join('\n');
    },
    awaitingDelayValue: () =>
        `Send the delay before the next step, in seconds (${MIN_STEP_DELAY}-${MAX_STEP_DELAY}).`,
    awaitingNewLabel: () =>
        `Send the new name (up to ${MAX_LABEL_LENGTH} characters).`,
    awaitingNodeBody: () => 'Send the new text for this section.',
    awaitingNodeMedia: () =>
        'Send a photo, video, document, audio, voice or video note.',
    awaitingWelcomeText: () => 'Send the new welcome text.',
    awaitingNewStepContent: () =>
        'Send the content of the new step, text or a single file.',
    awaitingNewStepCaption: () => 'Send a caption for this file, or skip it.',
    awaitingStepPosition: (stage) =>
        `Send the position for the new step (1-${stage.stepCount + 1}).`,
    awaitingPositionConfirm: (stage) =>
        `Insert the step at position ${stage.position}? Steps from there on move down by one.`,
    awaitingStepReplacement: (stage) =>
        `Send the new content for step ${stage.position}.`,
    awaitingStepDelay: (stage) =>
        `Send the delay before step ${stage.position}, in seconds (${MIN_STEP_DELAY}-${MAX_STEP_DELAY}).`,
    awaitingMoveTarget: (stage) =>
        `Move step ${stage.from} to which position (1-${stage.stepCount})?`,
};

const promptFor = <K extends TAuthoringStage['kind']>(
    kind: K,
    stage: Extract<TAuthoringStage, { kind: K }>,
): string => STAGE_PROMPTS[kind](stage);

const REJECTIONS: Record<TRejectionReason, string> = {
    labelEmpty: 'The name cannot be empty.',
    labelTooLong: `The name must be at most ${MAX_LABEL_LENGTH} characters.`,
    textRequired: 'Please send text.',
    mediaRequired: 'Please send a file.',
    contentRequired: 'Please send text or a single file.',
    delayNotInteger: 'The delay must be a whole number of seconds.',
    delayOutOfRange: `The delay must be between ${MIN_STEP_DELAY} and ${MAX_STEP_DELAY} seconds.`,
    positionNotInteger: 'The position must be a whole number.',
    positionOutOfRange: 'That position is out of range.',
    noSteps: 'Add at least one step before finishing.',
    confirmRequired: 'Use the buttons to confirm or go back.',
    unexpectedAction: 'That action is not available right now.',
};

const COMMIT_REPLIES: Record<TAuthoringCommit['kind'], string> = {
    createNode: 'Button created.',
    renameNode: 'Button renamed.',
    updateBody: 'Text updated.',
    attachMedia: 'Media attached.',
    updateWelcome: 'Welcome text updated.',
    insertStep: 'Step inserted.',
    replaceStepContent: 'Step updated.',
    updateStepDelay: 'Delay updated.',
    moveStep: 'Step moved.',
};

const DEFAULT_MESSAGES: IMenuBotMessages = {
    runtimeInitialized: ({ adminCount }) =>
        `Menu bot runtime initialized with ${adminCount} admin(s)`,
    pollingStarted: () => 'Polling started',
    pollingError: ({ error }) => `Polling error: ${describeError(error)}`,
    updateHandlingError: ({ event, error }) =>
        `Error while handling "${event}": ${describeError(error)}`,
    mediaDeliveryFailed: ({ nodeId, fileId, error }) =>
        `Could not deliver file ${fileId} of node ${nodeId}: ${describeError(error)}`,
    feedbackRelayFailed: ({ chatId, error }) =>
        `Could not relay feedback to chat ${chatId}: ${describeError(error)}`,
    chatActionFailed: ({ error }) =>
        `Chat action failed: ${describeError(error)}`,
    callbackAnswerFailed: ({ error }) =>
        `Could not answer callback query: ${describeError(error)}`,
    authoringCommitFailed: ({ kind, error }) =>
        `Could not apply "${kind}": ${describeError(error)}`,
    searchFailed: ({ error }) => `Search failed: ${describeError(error)}`,

    buttonSearch: () => '🔍 Search',
    buttonFeedback: () => '✉️ Feedback',
    buttonBack: () => '⬅️ Back',
    buttonHome: () => '🏠 Main menu',
    buttonAddRoot: () => '➕ Add button',
    buttonAddChild: () => '➕ Add sub-button',
    buttonRename: () => '✏️ Rename',
    buttonEditBody: () => '📝 Edit text',
    buttonEditSteps: () => '🧩 Steps',
    buttonAttachMedia: () => '📎 Attach media',
    buttonDetachMedia: () => '🚫 Remove media',
    buttonDelete: () => '🗑 Delete',
    buttonConfirmDelete: () => '🗑 Yes, delete',
    buttonEditWelcome: () => '👋 Edit welcome text',
    buttonUserMode: () => '👤 User mode',
    buttonAdminMode: () => '🛠 Admin mode',
    buttonInsertStep: () => '➕ Insert step',
    buttonStepEdit: ({ position, preview }) => `${position}. ${preview}`,
    buttonStepDelay: ({ delay }) => `⏱ ${delay}s`,
    buttonStepMove: () => '↕️',
    buttonStepDelete: () => '🗑',
    wizardAddStep: () => '➕ Add step',
    wizardSetDelay: () => '⏱ Delay for next step',
    wizardFinish: () => '✅ Finish',
    wizardBack: () => '⬅️ Back',
    wizardCancel: () => '✖️ Cancel',
    wizardSkipCaption: () => '⏭ Skip caption',
    wizardConfirm: () => '✅ Confirm',

    userIdInfo: ({ userId, username }) =>
        username
            ? `Your user ID: ${userId} (@${username})`
            : `Your user ID: ${userId}`,
    stagePrompt: (stage) => promptFor(stage.kind, stage),
    rejection: (reason) => REJECTIONS[reason],
    authoringCommitted: (commit) => COMMIT_REPLIES[commit.kind],
    authoringCancelled: () => 'Cancelled.',
    adminOnly: () => 'This action is available to administrators only.',
    staleButton: () => 'This button is outdated. Please open the menu again.',
    nodeNotFound: () => 'This section no longer exists.',
    stepNotFound: () => 'This step no longer exists.',
    genericError: () => 'Something went wrong. Please try again later.',
    adminModeEnabled: () => 'Admin mode enabled.',
    userModeEnabled: () => 'You now see the menu as a regular user.',
    deleteConfirm: ({ label, path }) =>
        `Delete "${[...path, label].join(' > ')}" together with all nested buttons and steps?`,
    nodeDeleted: ({ label }) => `"${label}" deleted.`,
    mediaDetached: () => 'Media removed.',
    stepDeleted: ({ position }) => `Step ${position} deleted.`,
    stepsOverview: ({ label, steps }) =>
        steps.length === 0
            ? `"${label}" has no steps yet.`
            : [`Steps of "${label}":`, ...steps.map((step, index) => `${index + 1}. ${step}`)].join('\n'),
    mediaUnavailable: () =>
        'Sorry, a file in this section is currently unavailable.',
    searchPrompt: () => 'What are you looking for? Send a few words.',
    searchQueryTooShort: ({ min }) =>
        `Please send at least ${min} characters.`,
    searchNotMeaningful: () =>
        'I could not understand the request. Try rephrasing it.',
    searchNoMatches: () => 'Nothing matched your request.',
    searchResultsHeader: ({ count }) => `Found ${count} section(s):`,
    searchResultLine: ({ index, label, parentLabel }) =>
        parentLabel ? `${index}. ${label} (in ${parentLabel})` : `${index}. ${label}`,
    searchMoreResults: ({ count }) => `...and ${count} more.`,
    searchUnavailable: () => 'Search is not available right now.',
    searchFailedReply: ({ status }) =>
        status
            ? `Search service error (${status}). Please try again later.`
            : 'Search failed. Please try again later.',
    feedbackPrompt: () =>
        'Send your message and we will pass it on to the team.',
    feedbackThanks: () => 'Thank you! Your message has been received.',
    feedbackUnavailable: () => 'Feedback is temporarily unavailable.',
    feedbackNotDelivered: () =>
        'We could not pass your message on to the team right now, but it has been received.',
    feedbackHeader: ({ userId, username, fullName, chatId, chatType }) =>
        [
            'New feedback',
            `User ID: ${userId ?? 'unknown'}`,
            `Username: ${username ? `@${username}` : 'none'}`,
            `Name: ${fullName || 'unknown'}`,
            `Chat: ${chatId} (${chatType})`,
        ].join('\n'),
};

export const DEFAULT_MENU_BOT_MESSAGES: IMenuBotMessages =
    Object.freeze(DEFAULT_MESSAGES);

export type MenuBotMessageFactory = (
    overrides?: Partial<IMenuBotMessages>,
) => IMenuBotMessages;

export const createMenuBotMessages: MenuBotMessageFactory = (
    overrides = {},
) => ({
    ...DEFAULT_MENU_BOT_MESSAGES,
    ...overrides,
});
