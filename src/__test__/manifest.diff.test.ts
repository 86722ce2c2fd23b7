import o from 'ospec';
import { ContentManifest, createContentManifest } from '../manifest';
import { diffManifests } from '../manifest.diff';

function manifest(files: Record<string, string>): ContentManifest {
  return createContentManifest(Object.entries(files).map(([path, hash]) => ({ path, hash })));
}

function paths(files: readonly { path: string }[]): string[] {
  return files.map((f) => f.path);
}

o.spec('ManifestDiff', () => {
  o('should be empty for the same manifest', () => {
    const m = manifest({ 'a.js': 'h1', 'b.js': 'h2' });
    o(diffManifests(m, m).isEmpty()).equals(true);
  });

  o('should be empty for manifests with the same files', () => {
    const diff = diffManifests(manifest({ 'a.js': 'h1', 'b.js': 'h2' }), manifest({ 'b.js': 'h2', 'a.js': 'h1' }));
    o(diff.isEmpty()).equals(true);
    o(diff.updateFiles).deepEquals([]);
  });

  o('should find added files', () => {
    const diff = diffManifests(manifest({ 'a.js': 'h1' }), manifest({ 'a.js': 'h1', 'b.js': 'h2' }));
    o(paths(diff.added)).deepEquals(['b.js']);
    o(paths(diff.updated)).deepEquals([]);
    o(paths(diff.removed)).deepEquals([]);
    o(paths(diff.updateFiles)).deepEquals(['b.js']);
    o(diff.isEmpty()).equals(false);
  });

  o('should find updated files', () => {
    const diff = diffManifests(manifest({ 'a.js': 'h1' }), manifest({ 'a.js': 'h2' }));
    o(paths(diff.added)).deepEquals([]);
    o(diff.updated).deepEquals([{ path: 'a.js', hash: 'h2' }]);
    o(paths(diff.removed)).deepEquals([]);
  });

  o('should find removed files', () => {
    const diff = diffManifests(manifest({ 'a.js': 'h1', 'old.css': 'h3' }), manifest({ 'a.js': 'h1' }));
    o(paths(diff.added)).deepEquals([]);
    o(paths(diff.updated)).deepEquals([]);
    o(paths(diff.removed)).deepEquals(['old.css']);
    o(diff.updateFiles).deepEquals([]);
    o(diff.isEmpty()).equals(false);
  });

  o('should download added and updated files, sorted by path', () => {
    const diff = diffManifests(
      manifest({ 'z.js': 'h1', 'm.js': 'h2', 'gone.js': 'h3' }),
      manifest({ 'z.js': 'h9', 'm.js': 'h2', 'b.js': 'h4', 'a.js': 'h5' }),
    );
    o(paths(diff.added)).deepEquals(['a.js', 'b.js']);
    o(paths(diff.updated)).deepEquals(['z.js']);
    o(paths(diff.removed)).deepEquals(['gone.js']);
    o(paths(diff.updateFiles)).deepEquals(['a.js', 'b.js', 'z.js']);
  });
});
