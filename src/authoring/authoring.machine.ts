import type { IMediaRef } from '../app.interface';
import {
    INodeDraft,
    IPendingStep,
    TAuthoringInput,
    TAuthoringOutcome,
    TAuthoringStage,
    TRejectionReason,
    returnNodeOf,
} from './authoring.state';
import {
    validateDelay,
    validateLabel,
    validatePosition,
    validateText,
} from './authoring.validation';

type TStageOf<K extends TAuthoringStage['kind']> = Extract<
    TAuthoringStage,
    { kind: K }
>;

const prompt = (stage: TAuthoringStage): TAuthoringOutcome => ({
    type: 'prompt',
    stage,
});

const reject = (
    stage: TAuthoringStage,
    reason: TRejectionReason,
): TAuthoringOutcome => ({ type: 'rejected', stage, reason });

const cancel = (stage: TAuthoringStage): TAuthoringOutcome => ({
    type: 'cancelled',
    returnTo: returnNodeOf(stage),
});

const isAction = (
    input: TAuthoringInput,
    action: Extract<TAuthoringInput, { type: 'action' }>['action'],
): boolean => input.type === 'action' && input.action === action;

/**
 * Reads step content from text or media input. Media without a caption
 * yields `needsCaption` so the caller can open the caption dialog.
 */
const readStepContent = (
    input: TAuthoringInput,
):
    | { kind: 'step'; step: IPendingStep }
    | { kind: 'needsCaption'; media: IMediaRef }
    | { kind: 'invalid'; reason: TRejectionReason } => {
    if (input.type === 'text') {
        const text = validateText(input.text);
        return text.valid
            ? { kind: 'step', step: { text: text.value, media: null } }
            : { kind: 'invalid', reason: 'contentRequired' };
    }

    if (input.type === 'media') {
        const caption = input.caption?.trim();
        return caption
            ? { kind: 'step', step: { text: caption, media: input.media } }
            : { kind: 'needsCaption', media: input.media };
    }

    return { kind: 'invalid', reason: 'unexpectedAction' };
};

/**
 * Appends a step to the draft. The first step of a node never waits; later
 * steps take the pending delay, which is consumed.
 */
export const appendDraftStep = (
    draft: INodeDraft,
    step: IPendingStep,
): INodeDraft => ({
    ...draft,
    steps: [
        ...draft.steps,
        {
            text: step.text,
            media: step.media,
            delay: draft.steps.length === 0 ? 0 : draft.pendingDelay,
        },
    ],
    pendingDelay: 0,
});

const finishDraft = (stage: TAuthoringStage, draft: INodeDraft): TAuthoringOutcome =>
    draft.steps.length === 0
        ? reject(stage, 'noSteps')
        : {
              type: 'commit',
              commit: {
                  kind: 'createNode',
                  parentId: draft.parentId,
                  label: draft.label,
                  steps: draft.steps,
              },
              returnTo: draft.parentId,
          };

const onLabel = (
    stage: TStageOf<'awaitingLabel'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    if (input.type !== 'text') {
        return reject(stage, 'textRequired');
    }

    const label = validateLabel(input.text);
    if (!label.valid) {
        return reject(stage, label.reason);
    }

    return prompt({
        kind: 'awaitingStepContent',
        draft: {
            parentId: stage.parentId,
            label: label.value,
            steps: [],
            pendingDelay: 0,
        },
    });
};

const onStepContent = (
    stage: TStageOf<'awaitingStepContent'> | TStageOf<'awaitingFinalization'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    const content = readStepContent(input);
    switch (content.kind) {
        case 'step':
            return prompt({
                kind: 'awaitingFinalization',
                draft: appendDraftStep(stage.draft, content.step),
            });
        case 'needsCaption':
            return prompt({
                kind: 'awaitingFileCaption',
                draft: stage.draft,
                media: content.media,
            });
        case 'invalid':
            return reject(stage, content.reason);
    }
};

const onAwaitingStepContent = (
    stage: TStageOf<'awaitingStepContent'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return stage.draft.steps.length > 0
            ? prompt({ kind: 'awaitingFinalization', draft: stage.draft })
            : prompt({ kind: 'awaitingLabel', parentId: stage.draft.parentId });
    }

    if (isAction(input, 'finish')) {
        return finishDraft(stage, stage.draft);
    }

    return onStepContent(stage, input);
};

const onFileCaption = (
    stage: TStageOf<'awaitingFileCaption'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return prompt({ kind: 'awaitingStepContent', draft: stage.draft });
    }

    if (isAction(input, 'skipCaption')) {
        return prompt({
            kind: 'awaitingFinalization',
            draft: appendDraftStep(stage.draft, { text: null, media: stage.media }),
        });
    }

    if (input.type !== 'text') {
        return reject(stage, 'textRequired');
    }

    const caption = validateText(input.text);
    if (!caption.valid) {
        return reject(stage, caption.reason);
    }

    return prompt({
        kind: 'awaitingFinalization',
        draft: appendDraftStep(stage.draft, {
            text: caption.value,
            media: stage.media,
        }),
    });
};

const onFinalization = (
    stage: TStageOf<'awaitingFinalization'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (input.type !== 'action') {
        return onStepContent(stage, input);
    }

    switch (input.action) {
        case 'addStep':
            return prompt({ kind: 'awaitingStepContent', draft: stage.draft });
        case 'setDelay':
            return prompt({ kind: 'awaitingDelayValue', draft: stage.draft });
        case 'finish':
            return finishDraft(stage, stage.draft);
        case 'back':
            return prompt({
                kind: 'awaitingStepContent',
                draft: { ...stage.draft, steps: stage.draft.steps.slice(0, -1) },
            });
        default:
            return reject(stage, 'unexpectedAction');
    }
};

const onDelayValue = (
    stage: TStageOf<'awaitingDelayValue'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return prompt({ kind: 'awaitingFinalization', draft: stage.draft });
    }

    if (input.type !== 'text') {
        return reject(stage, 'delayNotInteger');
    }

    const delay = validateDelay(input.text);
    if (!delay.valid) {
        return reject(stage, delay.reason);
    }

    return prompt({
        kind: 'awaitingFinalization',
        draft: { ...stage.draft, pendingDelay: delay.value },
    });
};

const onNodeEdit = (
    stage:
        | TStageOf<'awaitingNewLabel'>
        | TStageOf<'awaitingNodeBody'>
        | TStageOf<'awaitingNodeMedia'>
        | TStageOf<'awaitingWelcomeText'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    const returnTo = returnNodeOf(stage);

    if (stage.kind === 'awaitingNodeMedia') {
        return input.type === 'media'
            ? {
                  type: 'commit',
                  commit: { kind: 'attachMedia', nodeId: stage.nodeId, media: input.media },
                  returnTo,
              }
            : reject(stage, 'mediaRequired');
    }

    if (input.type !== 'text') {
        return reject(stage, 'textRequired');
    }

    if (stage.kind === 'awaitingNewLabel') {
        const label = validateLabel(input.text);
        return label.valid
            ? {
                  type: 'commit',
                  commit: { kind: 'renameNode', nodeId: stage.nodeId, label: label.value },
                  returnTo,
              }
            : reject(stage, label.reason);
    }

    const text = validateText(input.text);
    if (!text.valid) {
        return reject(stage, text.reason);
    }

    return stage.kind === 'awaitingNodeBody'
        ? {
              type: 'commit',
              commit: { kind: 'updateBody', nodeId: stage.nodeId, body: text.value },
              returnTo,
          }
        : {
              type: 'commit',
              commit: { kind: 'updateWelcome', text: text.value },
              returnTo,
          };
};

const onNewStepContent = (
    stage: TStageOf<'awaitingNewStepContent'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    const content = readStepContent(input);
    switch (content.kind) {
        case 'step':
            return prompt({
                kind: 'awaitingStepPosition',
                nodeId: stage.nodeId,
                stepCount: stage.stepCount,
                step: content.step,
            });
        case 'needsCaption':
            return prompt({
                kind: 'awaitingNewStepCaption',
                nodeId: stage.nodeId,
                stepCount: stage.stepCount,
                media: content.media,
            });
        case 'invalid':
            return reject(stage, content.reason);
    }
};

const onNewStepCaption = (
    stage: TStageOf<'awaitingNewStepCaption'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    const toPosition = (text: string | null): TAuthoringOutcome =>
        prompt({
            kind: 'awaitingStepPosition',
            nodeId: stage.nodeId,
            stepCount: stage.stepCount,
            step: { text, media: stage.media },
        });

    if (isAction(input, 'back')) {
        return prompt({
            kind: 'awaitingNewStepContent',
            nodeId: stage.nodeId,
            stepCount: stage.stepCount,
        });
    }

    if (isAction(input, 'skipCaption')) {
        return toPosition(null);
    }

    if (input.type !== 'text') {
        return reject(stage, 'textRequired');
    }

    const caption = validateText(input.text);
    return caption.valid ? toPosition(caption.value) : reject(stage, caption.reason);
};

const onStepPosition = (
    stage: TStageOf<'awaitingStepPosition'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return prompt({
            kind: 'awaitingNewStepContent',
            nodeId: stage.nodeId,
            stepCount: stage.stepCount,
        });
    }

    if (input.type !== 'text') {
        return reject(stage, 'positionNotInteger');
    }

    const position = validatePosition(input.text, stage.stepCount + 1);
    if (!position.valid) {
        return reject(stage, position.reason);
    }

    return prompt({
        kind: 'awaitingPositionConfirm',
        nodeId: stage.nodeId,
        stepCount: stage.stepCount,
        step: stage.step,
        position: position.value,
    });
};

const onPositionConfirm = (
    stage: TStageOf<'awaitingPositionConfirm'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return prompt({
            kind: 'awaitingStepPosition',
            nodeId: stage.nodeId,
            stepCount: stage.stepCount,
            step: stage.step,
        });
    }

    if (!isAction(input, 'confirm')) {
        return reject(stage, 'confirmRequired');
    }

    return {
        type: 'commit',
        commit: {
            kind: 'insertStep',
            nodeId: stage.nodeId,
            position: stage.position,
            step: stage.step,
        },
        returnTo: stage.nodeId,
    };
};

const onStepReplacement = (
    stage: TStageOf<'awaitingStepReplacement'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    const content = readStepContent(input);
    if (content.kind === 'invalid') {
        return reject(stage, content.reason);
    }

    const step: IPendingStep =
        content.kind === 'step'
            ? content.step
            : { text: null, media: content.media };

    return {
        type: 'commit',
        commit: {
            kind: 'replaceStepContent',
            nodeId: stage.nodeId,
            position: stage.position,
            step,
        },
        returnTo: stage.nodeId,
    };
};

const onStepDelay = (
    stage: TStageOf<'awaitingStepDelay'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    if (input.type !== 'text') {
        return reject(stage, 'delayNotInteger');
    }

    const delay = validateDelay(input.text);
    if (!delay.valid) {
        return reject(stage, delay.reason);
    }

    return {
        type: 'commit',
        commit: {
            kind: 'updateStepDelay',
            nodeId: stage.nodeId,
            position: stage.position,
            delay: delay.value,
        },
        returnTo: stage.nodeId,
    };
};

const onMoveTarget = (
    stage: TStageOf<'awaitingMoveTarget'>,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'back')) {
        return cancel(stage);
    }

    if (input.type !== 'text') {
        return reject(stage, 'positionNotInteger');
    }

    const target = validatePosition(input.text, stage.stepCount);
    if (!target.valid) {
        return reject(stage, target.reason);
    }

    return {
        type: 'commit',
        commit: {
            kind: 'moveStep',
            nodeId: stage.nodeId,
            from: stage.from,
            to: target.value,
        },
        returnTo: stage.nodeId,
    };
};

/**
 * Advances an authoring conversation by one input. Pure: the caller persists
 * the returned stage or applies the returned commit.
 */
export const advanceAuthoring = (
    stage: TAuthoringStage,
    input: TAuthoringInput,
): TAuthoringOutcome => {
    if (isAction(input, 'cancel')) {
        return cancel(stage);
    }

    switch (stage.kind) {
        case 'awaitingLabel':
            return onLabel(stage, input);
        case 'awaitingStepContent':
            return onAwaitingStepContent(stage, input);
        case 'awaitingFileCaption':
            return onFileCaption(stage, input);
        case 'awaitingFinalization':
            return onFinalization(stage, input);
        case 'awaitingDelayValue':
            return onDelayValue(stage, input);
        case 'awaitingNewLabel':
        case 'awaitingNodeBody':
        case 'awaitingNodeMedia':
        case 'awaitingWelcomeText':
            return onNodeEdit(stage, input);
        case 'awaitingNewStepContent':
            return onNewStepContent(stage, input);
        case 'awaitingNewStepCaption':
            return onNewStepCaption(stage, input);
        case 'awaitingStepPosition':
            return onStepPosition(stage, input);
        case 'awaitingPositionConfirm':
            return onPositionConfirm(stage, input);
        case 'awaitingStepReplacement':
            return onStepReplacement(stage, input);
        case 'awaitingStepDelay':
            return onStepDelay(stage, input);
        case 'awaitingMoveTarget':
            return onMoveTarget(stage, input);
    }
};
