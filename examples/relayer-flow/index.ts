/**
 * Relayer Flow Example
 *
 * An offline maintainer signs a release grant for a relayer. The relayer then
 * claims a repository, records a snapshot and anchors a release, and
 * governance accepts it.
 */

import {
  Capability,
  Ed25519Signer,
  ManualClock,
  ProvenancePatterns,
  createProvenanceLedger,
  describeScopeMask,
  labelHash,
  toIsoString,
} from '../../src/index.js';

const clock = new ManualClock();
const provenance = createProvenanceLedger({ clock });

const maintainer = Ed25519Signer.generate();
const governance = Ed25519Signer.generate();
const relayer = Ed25519Signer.generate().identity;

const context = labelHash('example-workspace');
const repoId = labelHash('example-repo');
const merkleRoot = labelHash('example-root');
const releaseId = labelHash('example-release-1.0.0');

console.log('Provenance Ledger - Relayer Flow Example');
console.log('========================================');
console.log(`Maintainer: ${maintainer.identity}`);
console.log(`Relayer:    ${relayer}\n`);

async function setUpWorkspace(): Promise<void> {
  await provenance.workspaces.initAuthority(maintainer.identity, context, maintainer.identity);
  await ProvenancePatterns.setMember(provenance, maintainer, {
    context,
    member: governance.identity,
    isMember: true,
    deadline: clock.now() + 300,
  });
  console.log(`Workspace ${context} has authority ${provenance.workspaces.authorityOf(context)}`);
}

async function delegateToRelayer(): Promise<void> {
  const scopeMask = Capability.CLAIM | Capability.SNAPSHOT | Capability.RELEASE;
  const grant = await ProvenancePatterns.grant(provenance, maintainer, {
    principal: maintainer.identity,
    relayer,
    context,
    scopeMask,
    expiry: clock.now() + 86_400,
    deadline: clock.now() + 300,
  });
  console.log(
    `Granted ${JSON.stringify(describeScopeMask(grant.scopeMask))} until ${toIsoString(grant.expiry)}`
  );
}

async function publishRelease(): Promise<void> {
  await provenance.repositories.claimRepo(relayer, repoId, context, 'example', maintainer.identity);
  await provenance.snapshots.createSnapshot(relayer, {
    repoId,
    context,
    commitHash: labelHash('example-commit'),
    merkleRoot,
    manifestCid: 'bafy-example-snapshot',
    author: maintainer.identity,
  });

  const release = await provenance.releases.anchorRelease(relayer, {
    projectId: labelHash('example-project'),
    id: releaseId,
    context,
    manifestRef: 'bafy-example-release',
    name: 'v1.0.0',
    author: maintainer.identity,
    governanceAuthority: governance.identity,
    snapshotRefs: [{ repoId, merkleRoot }],
  });
  console.log(`Anchored ${release.name}: ${release.status}`);

  clock.advance(3_600);
  const accepted = await provenance.releases.accept(governance.identity, releaseId);
  console.log(`Governance verdict: ${accepted.status} at ${toIsoString(accepted.statusTimestamp)}`);
}

async function main(): Promise<void> {
  try {
    await setUpWorkspace();
    await delegateToRelayer();
    await publishRelease();

    const trail = await provenance.events.read();
    console.log(`\nEvent trail (${trail.length} facts):`);
    for (const event of trail) {
      console.log(`  #${event.sequence} ${event.type}`);
    }
  } catch (error) {
    console.error('Error running example:', error);
    process.exit(1);
  }
}

void main();
