import { createHash } from 'node:crypto';
import { CALLBACK_HASH_LENGTH, MAX_CALLBACK_DATA_BYTES } from '../app.constants';
import { TWizardAction, WIZARD_ACTIONS } from '../authoring/authoring.state';
import { buildNodeToken } from '../storage/storage.utils';

type TEmptyPayload = Record<never, never>;

interface INodePayload {
    nodeId: number;
}

interface IStepPayload {
    nodeId: number;
    position: number;
}

export interface IMenuCommandPayloads {
    home: TEmptyPayload;
    open: INodePayload;
    search: TEmptyPayload;
    feedback: TEmptyPayload;
    toggleMode: TEmptyPayload;
    addNode: { parentId: number | null };
    renameNode: INodePayload;
    editBody: INodePayload;
    attachMedia: INodePayload;
    detachMedia: INodePayload;
    deleteNode: INodePayload;
    confirmDelete: INodePayload;
    editSteps: INodePayload;
    insertStep: INodePayload;
    editStep: IStepPayload;
    editStepDelay: IStepPayload;
    moveStep: IStepPayload;
    deleteStep: IStepPayload;
    editWelcome: TEmptyPayload;
    wizard: { action: TWizardAction };
}

export type TMenuCommandTag = keyof IMenuCommandPayloads;

export type TMenuCommand<K extends TMenuCommandTag = TMenuCommandTag> = {
    [P in K]: { tag: P } & IMenuCommandPayloads[P];
}[K];

export const ADMIN_COMMAND_TAGS: ReadonlySet<TMenuCommandTag> = new Set<
    TMenuCommandTag
>([
    'toggleMode',
    'addNode',
    'renameNode',
    'editBody',
    'attachMedia',
    'detachMedia',
    'deleteNode',
    'confirmDelete',
    'editSteps',
    'insertStep',
    'editStep',
    'editStepDelay',
    'moveStep',
    'deleteStep',
    'editWelcome',
    'wizard',
]);

const HASH_TOKEN_PREFIX = 'h:';
const LEGACY_NODE_TOKEN = /^btn_id_(\d+)$/;
const ROOT_PARENT = '0';

const step = (prefix: string, payload: IStepPayload): string =>
    `${prefix}:${payload.nodeId}:${payload.position}`;

const ENCODERS: {
    [K in TMenuCommandTag]: (command: TMenuCommand<K>) => string;
} = {
    home: () => 'home',
    open: (command) => buildNodeToken(command.nodeId),
    search: () => 'search',
    feedback: () => 'feedback',
    toggleMode: () => 'mode',
    addNode: (command) => `add:${command.parentId ?? ROOT_PARENT}`,
    renameNode: (command) => `ren:${command.nodeId}`,
    editBody: (command) => `body:${command.nodeId}`,
    attachMedia: (command) => `media:${command.nodeId}`,
    detachMedia: (command) => `unmedia:${command.nodeId}`,
    deleteNode: (command) => `del:${command.nodeId}`,
    confirmDelete: (command) => `delok:${command.nodeId}`,
    editSteps: (command) => `steps:${command.nodeId}`,
    insertStep: (command) => `ins:${command.nodeId}`,
    editStep: (command) => step('sedit', command),
    editStepDelay: (command) => step('sdelay', command),
    moveStep: (command) => step('smove', command),
    deleteStep: (command) => step('sdel', command),
    editWelcome: () => 'welcome',
    wizard: (command) => `wz:${command.action}`,
};

const parseId = (value: string | undefined): number | undefined => {
    if (value === undefined || !/^\d+$/.test(value)) {
        return undefined;
    }
    const id = Number(value);
    return Number.isSafeInteger(id) ? id : undefined;
};

const nodeCommand =
    (build: (nodeId: number) => TMenuCommand) =>
    (args: string[]): TMenuCommand | undefined => {
        const nodeId = parseId(args[0]);
        return args.length === 1 && nodeId !== undefined && nodeId > 0
            ? build(nodeId)
            : undefined;
    };

const stepCommand =
    (build: (nodeId: number, position: number) => TMenuCommand) =>
    (args: string[]): TMenuCommand | undefined => {
        const nodeId = parseId(args[0]);
        const position = parseId(args[1]);
        return args.length === 2 &&
            nodeId !== undefined &&
            position !== undefined &&
            nodeId > 0 &&
            position > 0
            ? build(nodeId, position)
            : undefined;
    };

const fixedCommand =
    (command: TMenuCommand) =>
    (args: string[]): TMenuCommand | undefined =>
        args.length === 0 ? command : undefined;

const DECODERS: Record<string, (args: string[]) => TMenuCommand | undefined> = {
    home: fixedCommand({ tag: 'home' }),
    search: fixedCommand({ tag: 'search' }),
    feedback: fixedCommand({ tag: 'feedback' }),
    mode: fixedCommand({ tag: 'toggleMode' }),
    welcome: fixedCommand({ tag: 'editWelcome' }),
    id: nodeCommand((nodeId) => ({ tag: 'open', nodeId })),
    add: (args) => {
        const parentId = parseId(args[0]);
        if (args.length !== 1 || parentId === undefined) {
            return undefined;
        }
        return { tag: 'addNode', parentId: parentId === 0 ? null : parentId };
    },
    ren: nodeCommand((nodeId) => ({ tag: 'renameNode', nodeId })),
    body: nodeCommand((nodeId) => ({ tag: 'editBody', nodeId })),
    media: nodeCommand((nodeId) => ({ tag: 'attachMedia', nodeId })),
    unmedia: nodeCommand((nodeId) => ({ tag: 'detachMedia', nodeId })),
    del: nodeCommand((nodeId) => ({ tag: 'deleteNode', nodeId })),
    delok: nodeCommand((nodeId) => ({ tag: 'confirmDelete', nodeId })),
    steps: nodeCommand((nodeId) => ({ tag: 'editSteps', nodeId })),
    ins: nodeCommand((nodeId) => ({ tag: 'insertStep', nodeId })),
    sedit: stepCommand((nodeId, position) => ({ tag: 'editStep', nodeId, position })),
    sdelay: stepCommand((nodeId, position) => ({
        tag: 'editStepDelay',
        nodeId,
        position,
    })),
    smove: stepCommand((nodeId, position) => ({ tag: 'moveStep', nodeId, position })),
    sdel: stepCommand((nodeId, position) => ({ tag: 'deleteStep', nodeId, position })),
    wz: (args) => {
        const action = WIZARD_ACTIONS.find((candidate) => candidate === args[0]);
        return args.length === 1 && action ? { tag: 'wizard', action } : undefined;
    },
};

const encodeWith = <K extends TMenuCommandTag>(
    tag: K,
    command: TMenuCommand<K>,
): string => ENCODERS[tag](command);

/** Serializes a command into its callback token, before any shortening. */
export const encodeMenuCommand = (command: TMenuCommand): string =>
    encodeWith(command.tag, command);

/**
 * Parses a callback token back into a command. Returns `undefined` for
 * unknown, malformed and hash-shortened tokens, which the caller treats as a
 * stale button.
 */
export const parseMenuCommand = (
    token: string | undefined,
): TMenuCommand | undefined => {
    if (!token || token.startsWith(HASH_TOKEN_PREFIX)) {
        return undefined;
    }

    const legacy = LEGACY_NODE_TOKEN.exec(token);
    if (legacy) {
        const nodeId = parseId(legacy[1]);
        return nodeId ? { tag: 'open', nodeId } : undefined;
    }

    const [prefix, ...args] = token.split(':');
    if (prefix === undefined || !Object.hasOwn(DECODERS, prefix)) {
        return undefined;
    }

    return DECODERS[prefix]?.(args);
};

/**
 * Keeps tokens that fit the platform's callback budget and replaces longer
 * ones with a fixed-size content hash.
 */
export const fitCallbackData = (token: string): string => {
    if (Buffer.byteLength(token, 'utf8') <= MAX_CALLBACK_DATA_BYTES) {
        return token;
    }

    const digest = createHash('md5').update(token, 'utf8').digest('hex');
    return `${HASH_TOKEN_PREFIX}${digest.slice(0, CALLBACK_HASH_LENGTH)}`;
};

export const toCallbackData = (command: TMenuCommand): string =>
    fitCallbackData(encodeMenuCommand(command));

export const isAdminCommand = (command: TMenuCommand): boolean =>
    ADMIN_COMMAND_TAGS.has(command.tag);
