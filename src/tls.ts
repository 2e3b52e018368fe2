import * as crypto from 'node:crypto';
import * as forge from 'node-forge';

const Rand = function (length: number): Buffer {
	return crypto.randomBytes(length);
};

const randomHexId = function (): string {
	return Rand(Math.floor(Math.random()*20+4)).toString('hex')
};

// relays expect a plausible looking SNI name, not their own address
export const makeRandomServerName = function (): string {
	return `www.${randomHexId()}.com`
};

export type LinkKeyPair = {
	privateKeyPem: string,
	publicKeyPem: string,
}

export const generateLinkKeyPair = function (modulusLength = 2048): LinkKeyPair {
	const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
		modulusLength,
		publicKeyEncoding: { type: 'spki', format: 'pem' },
		privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
	});
	return { privateKeyPem: privateKey, publicKeyPem: publicKey };
};

export type LinkCertificate = {
	pem: string,
	der: Buffer,
}

// A self-signed X.509 link certificate, the kind a relay presents on its TLS
// listener.
export const createLinkCertificate = function (keyPair: LinkKeyPair, {
	date = new Date(),
	subject,
	issuer,
}: { date?: Date, subject?: string, issuer?: string } = {}): LinkCertificate {
	const publicKey = forge.pki.publicKeyFromPem(keyPair.publicKeyPem);
	const privateKey = forge.pki.privateKeyFromPem(keyPair.privateKeyPem);
	const cert = forge.pki.createCertificate();
	cert.serialNumber = `00${Rand(8).toString('hex')}`;
	// backdate a little for peers with a slow clock
	const notBefore = new Date(date.valueOf());
	notBefore.setHours(notBefore.getHours() - 2);
	const notAfter = new Date(notBefore.valueOf());
	notAfter.setFullYear(notBefore.getFullYear() + 1);
	cert.validity.notBefore = notBefore;
	cert.validity.notAfter = notAfter;
	cert.setSubject([{
		name: 'commonName',
		value: subject || makeRandomServerName(),
	}]);
	cert.setIssuer([{
		name: 'commonName',
		value: issuer || makeRandomServerName(),
	}]);
	cert.publicKey = publicKey;
	cert.sign(privateKey, forge.md.sha256.create());
	const pem = forge.pki.certificateToPem(cert);
	const der = Buffer.from(forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes(), 'binary');
	return { pem, der };
};
