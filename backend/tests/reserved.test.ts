import { helpText, isReservedPath, noscriptHtml } from '../src/reserved';

describe('isReservedPath', () => {
  it.each(['/', '/noscript', '/version', '/help', '/robots.txt', '/favicon.ico'])('reserves %s', (path) => {
    expect(isReservedPath(path)).toBe(true);
  });

  it.each(['/help/', '/Help', '/version.txt', '/mypath', ''])('leaves %s to the relay', (path) => {
    expect(isReservedPath(path)).toBe(false);
  });
});

describe('helpText', () => {
  it('names the version and the server URL', () => {
    const text = helpText('https://relay.example', '9.9.9');
    expect(text.split('\n')[0]).toBe('Help for pipe-relay 9.9.9');
    expect(text).toContain('\ncurl https://relay.example/mypath\n');
    expect(text).toContain("\ncurl -T myfile 'https://relay.example/mypath?n=3'\n");
  });
});

describe('noscriptHtml', () => {
  it('shows only the form when no path was chosen', () => {
    const html = noscriptHtml('', 'http://localhost:8080');
    expect(html).toContain('<input name="path" value="" placeholder="/mypath">');
    expect(html).not.toContain('<h3>Receive</h3>');
    expect(html).not.toContain('<form method="POST"');
    expect(html).toContain('<h2>Receive without JavaScript</h2>');
  });

  it('links the chosen path', () => {
    const html = noscriptHtml('files/a', 'http://localhost:8080');
    expect(html).toContain('<p><a href="/files/a">http://localhost:8080/files/a</a></p>');
    expect(html).toContain(
      '<h3>Send from a terminal</h3>\n  <p>This page cannot upload. Run:</p>\n  <pre>curl -T myfile http://localhost:8080/files/a</pre>',
    );
  });

  it('escapes markup in the path', () => {
    const html = noscriptHtml('/"><script>x</script>', 'http://localhost:8080');
    expect(html).toContain('value="/&quot;&gt;&lt;script&gt;x&lt;/script&gt;"');
    expect(html).not.toContain('<script>');
  });
});
