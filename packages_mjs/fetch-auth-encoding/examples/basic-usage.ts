import { decodeBasicAuth, encodeBasicAuth, encodeBasicAuthHeader } from '@fetch-session/auth-encoding';

function main() {
    console.log('--- Basic Auth ---');
    const header = encodeBasicAuth('user1', 'password1');
    console.log('Authorization:', header);

    console.log('\n--- Header map ---');
    console.log('Headers:', encodeBasicAuthHeader({ username: 'user1', password: 'open:sesame' }));

    console.log('\n--- Decode ---');
    console.log('Credentials:', decodeBasicAuth(header));
}

main();
