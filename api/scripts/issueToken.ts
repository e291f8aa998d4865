/**
 * Issue an API token for a profile
 *
 * Usage: tsx scripts/issueToken.ts <username>
 *
 * Prints the token once; only its hash is stored.
 */
import 'dotenv/config';
import { eq } from 'drizzle-orm';
import { createDatabase } from '../src/db/client';
import { profiles, profileTokens } from '../src/db/schema';
import { loadConfig } from '../src/utils/config';
import { generateApiToken } from '../src/utils/crypto';

async function issue(username: string | undefined) {
  if (!username) {
    throw new Error('Usage: tsx scripts/issueToken.ts <username>');
  }

  const database = createDatabase(loadConfig());
  try {
    const [profile] = await database.db
      .select({ id: profiles.id })
      .from(profiles)
      .where(eq(profiles.username, username))
      .limit(1);
    if (!profile) {
      throw new Error(`No profile with username ${username}`);
    }

    const issued = generateApiToken();
    await database.db.insert(profileTokens).values({
      tokenId: issued.tokenId,
      profileId: profile.id,
      hash: issued.hash,
    });

    console.log(issued.token);
  } finally {
    await database.close();
  }
}

issue(process.argv[2]).catch((e) => { console.error(e); process.exit(1); });
