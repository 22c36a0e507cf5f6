import type { IMediaRef } from '../app.interface';

export type TWizardAction =
    | 'addStep'
    | 'setDelay'
    | 'finish'
    | 'back'
    | 'cancel'
    | 'skipCaption'
    | 'confirm';

export const WIZARD_ACTIONS: readonly TWizardAction[] = [
    'addStep',
    'setDelay',
    'finish',
    'back',
    'cancel',
    'skipCaption',
    'confirm',
];

/** Step content collected before it has a position. */
export interface IPendingStep {
    text: string | null;
    media: IMediaRef | null;
}

export interface IDraftStep extends IPendingStep {
    delay: number;
}

export interface INodeDraft {
    parentId: number | null;
    label: string;
    steps: IDraftStep[];
    /** Delay applied to the next appended step, then reset to zero. */
    pendingDelay: number;
}

type TCreationStage =
    | { kind: 'awaitingLabel'; parentId: number | null }
    | { kind: 'awaitingStepContent'; draft: INodeDraft }
    | { kind: 'awaitingFileCaption'; draft: INodeDraft; media: IMediaRef }
    | { kind: 'awaitingFinalization'; draft: INodeDraft }
    | { kind: 'awaitingDelayValue'; draft: INodeDraft };

type TNodeEditStage =
    | { kind: 'awaitingNewLabel'; nodeId: number }
    | { kind: 'awaitingNodeBody'; nodeId: number }
    | { kind: 'awaitingNodeMedia'; nodeId: number }
    | { kind: 'awaitingWelcomeText' };

type TStepEditStage =
    | { kind: 'awaitingNewStepContent'; nodeId: number; stepCount: number }
    | {
          kind: 'awaitingNewStepCaption';
          nodeId: number;
          stepCount: number;
          media: IMediaRef;
      }
    | {
          kind: 'awaitingStepPosition';
          nodeId: number;
          stepCount: number;
          step: IPendingStep;
      }
    | {
          kind: 'awaitingPositionConfirm';
          nodeId: number;
          stepCount: number;
          step: IPendingStep;
          position: number;
      }
    | { kind: 'awaitingStepReplacement'; nodeId: number; position: number }
    | { kind: 'awaitingStepDelay'; nodeId: number; position: number }
    | {
          kind: 'awaitingMoveTarget';
          nodeId: number;
          from: number;
          stepCount: number;
      };

export type TAuthoringStage = TCreationStage | TNodeEditStage | TStepEditStage;

export type TConversationStage =
    | { kind: 'idle' }
    | { kind: 'awaitingSearchQuery' }
    | { kind: 'awaitingFeedback' }
    | TAuthoringStage;

export type TAuthoringStageKind = TAuthoringStage['kind'];

export const IDLE_STAGE: TConversationStage = Object.freeze({ kind: 'idle' });

export const isAuthoringStage = (
    stage: TConversationStage,
): stage is TAuthoringStage =>
    stage.kind !== 'idle' &&
    stage.kind !== 'awaitingSearchQuery' &&
    stage.kind !== 'awaitingFeedback';

/**
 * Node the admin lands on when the stage is abandoned: the parent for a node
 * under construction, the edited node otherwise, the root for welcome edits.
 */
export const returnNodeOf = (stage: TAuthoringStage): number | null => {
    switch (stage.kind) {
        case 'awaitingLabel':
            return stage.parentId;
        case 'awaitingStepContent':
        case 'awaitingFileCaption':
        case 'awaitingFinalization':
        case 'awaitingDelayValue':
            return stage.draft.parentId;
        case 'awaitingWelcomeText':
            return null;
        default:
            return stage.nodeId;
    }
};

export type TAuthoringInput =
    | { type: 'text'; text: string }
    | { type: 'media'; media: IMediaRef; caption: string | null }
    | { type: 'action'; action: TWizardAction };

export type TAuthoringCommit =
    | {
          kind: 'createNode';
          parentId: number | null;
          label: string;
          steps: IDraftStep[];
      }
    | { kind: 'renameNode'; nodeId: number; label: string }
    | { kind: 'updateBody'; nodeId: number; body: string }
    | { kind: 'attachMedia'; nodeId: number; media: IMediaRef }
    | { kind: 'updateWelcome'; text: string }
    | {
          kind: 'insertStep';
          nodeId: number;
          position: number;
          step: IPendingStep;
      }
    | {
          kind: 'replaceStepContent';
          nodeId: number;
          position: number;
          step: IPendingStep;
      }
    | { kind: 'updateStepDelay'; nodeId: number; position: number; delay: number }
    | { kind: 'moveStep'; nodeId: number; from: number; to: number };

export type TRejectionReason =
    | 'labelEmpty'
    | 'labelTooLong'
    | 'textRequired'
    | 'mediaRequired'
    | 'contentRequired'
    | 'delayNotInteger'
    | 'delayOutOfRange'
    | 'positionNotInteger'
    | 'positionOutOfRange'
    | 'noSteps'
    | 'confirmRequired'
    | 'unexpectedAction';

export type TAuthoringOutcome =
    | { type: 'prompt'; stage: TAuthoringStage }
    | { type: 'rejected'; stage: TAuthoringStage; reason: TRejectionReason }
    | { type: 'commit'; commit: TAuthoringCommit; returnTo: number | null }
    | { type: 'cancelled'; returnTo: number | null };
