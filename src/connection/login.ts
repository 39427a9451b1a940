/**
 * exasol-ws-client - Login Handshake
 *
 * Password login: request the server's public key, then send the credentials
 * with the password RSA-encrypted (PKCS#1 v1.5, base64). Token login skips
 * the key exchange. Compression is only switched on once the handshake is
 * done.
 */

import { constants, publicEncrypt } from 'node:crypto';
import { platform, userInfo } from 'node:os';
import type { ConnectionConfig } from '../config/schema.js';
import type { Session, SendOptions } from '../transports/Session.js';
import {
    LoginInfoSchema,
    PROTOCOL_VERSION,
    PublicKeyResponseSchema,
    type Attributes,
    type AuthRequest,
    type LoginInfo
} from '../types/index.js';
import { VERSION } from '../version.js';

export function encryptPassword(publicKeyPem: string, password: string): string {
    return publicEncrypt(
        { key: publicKeyPem, padding: constants.RSA_PKCS1_PADDING },
        Buffer.from(password, 'utf8')
    ).toString('base64');
}

function osUsername(): string {
    try {
        return userInfo().username;
    } catch {
        // no passwd entry for the uid, common in containers
        return 'unknown';
    }
}

export function sessionAttributes(config: ConnectionConfig): Attributes {
    const attributes: Attributes = { autocommit: config.autocommit };
    if (config.schema !== undefined) {
        attributes.currentSchema = config.schema;
    }
    if (config.queryTimeout !== undefined) {
        attributes.queryTimeout = config.queryTimeout;
    }
    return attributes;
}

export async function login(
    session: Session,
    config: ConnectionConfig,
    options: SendOptions = {}
): Promise<LoginInfo> {
    session.setCompression(false);

    const request: AuthRequest = {
        useCompression: config.compression,
        clientName: config.clientName,
        driverName: `exasol-ws-client ${VERSION}`,
        clientOs: platform(),
        clientOsUsername: osUsername(),
        clientVersion: config.clientVersion ?? VERSION,
        clientRuntime: `Node.js ${process.version}`,
        attributes: sessionAttributes(config)
    };

    if (config.accessToken !== undefined || config.refreshToken !== undefined) {
        await session.send({ command: 'loginToken', protocolVersion: PROTOCOL_VERSION }, undefined, options);
        if (config.accessToken !== undefined) {
            request.accessToken = config.accessToken;
        } else {
            request.refreshToken = config.refreshToken;
        }
    } else {
        const publicKey = await session.send(
            { command: 'login', protocolVersion: PROTOCOL_VERSION },
            PublicKeyResponseSchema,
            options
        );
        request.username = config.user;
        request.password = encryptPassword(publicKey.publicKeyPem, config.password ?? '');
    }

    const info = await session.send(request, LoginInfoSchema, options);
    session.setCompression(config.compression);
    return info;
}
