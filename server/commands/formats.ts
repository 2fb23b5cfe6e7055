/**
 * Command Formats
 *
 * One payload builder per wire format. Builders are pure apart from the
 * millisecond id of the module_operate format.
 *
 * | format         | shape                                                        |
 * |----------------|--------------------------------------------------------------|
 * | cmd_func       | { sn, cmdId: 17, cmdFunc: 254, dirDest, dirSrc, dest, needAck, params } |
 * | cmd_set        | { sn, params: { cmdSet, id, ...params } }                   |
 * | module_operate | { id, version: "1.0", sn, moduleType, operateType, params }  |
 * | cmd_code       | { sn, cmdCode, params }                                      |
 *
 * @module server/commands/formats
 */

import { EncodingError } from '../errors';
import type { CommandFormat, CommandRouting } from '../profiles/types';
import type { PayloadBuilder } from './types';

function missingRouting(format: CommandFormat, fields: string): EncodingError {
    return new EncodingError('MISSING_ROUTING',
        `Format ${format} requires routing ${fields}`,
        { format }
    );
}

const cmdFunc: PayloadBuilder = (deviceId, params) => ({
    sn: deviceId,
    cmdId: 17,
    cmdFunc: 254,
    dirDest: 1,
    dirSrc: 1,
    dest: 2,
    needAck: true,
    params,
});

const cmdSet: PayloadBuilder = (deviceId, params, routing: CommandRouting) => {
    if (routing.cmdSet === undefined || routing.cmdId === undefined) {
        throw missingRouting('cmd_set', 'cmdSet and cmdId');
    }
    return {
        sn: deviceId,
        params: {
            cmdSet: routing.cmdSet,
            id: routing.cmdId,
            ...params,
        },
    };
};

const moduleOperate: PayloadBuilder = (deviceId, params, routing) => {
    if (routing.moduleType === undefined || routing.operateType === undefined) {
        throw missingRouting('module_operate', 'moduleType and operateType');
    }
    return {
        id: Date.now(),
        version: '1.0',
        sn: deviceId,
        moduleType: routing.moduleType,
        operateType: routing.operateType,
        params,
    };
};

const cmdCode: PayloadBuilder = (deviceId, params, routing) => {
    if (routing.cmdCode === undefined) {
        throw missingRouting('cmd_code', 'cmdCode');
    }
    return {
        sn: deviceId,
        cmdCode: routing.cmdCode,
        params,
    };
};

export const payloadBuilders: Record<CommandFormat, PayloadBuilder> = {
    cmd_func: cmdFunc,
    cmd_set: cmdSet,
    module_operate: moduleOperate,
    cmd_code: cmdCode,
};
