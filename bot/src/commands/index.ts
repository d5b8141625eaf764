import type { Command } from 'slashhook';
import { createAttachmentResponse } from './attachment-response.js';
import { intAndFloatBounding } from './bounding.js';
import { echo } from './echo.js';
import { findFruit, pickFruit } from './fruit.js';
import { getRole } from './get-role.js';
import { groupName } from './group.js';
import { helloWorld } from './hello-world.js';
import { sayHello } from './say-hello.js';
import { uploadFile } from './upload-file.js';
import { whois } from './whois.js';

/** Every command the example bot serves, in registration order. */
export const commands: readonly Command[] = [
    echo,
    intAndFloatBounding,
    helloWorld,
    groupName,
    sayHello,
    uploadFile,
    createAttachmentResponse(),
    getRole,
    pickFruit,
    findFruit,
    whois,
];
