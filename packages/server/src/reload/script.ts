/**
 * Client script appended to HTML responses while live reload is on.
 *
 * The first version received is the baseline; a later, strictly greater
 * version reloads the page.
 */
export function liveReloadScript(reloadPath: string): string {
    return (
        '\n<script>(function(){' +
        `var source=new EventSource(${JSON.stringify(reloadPath)});` +
        'var version=null;' +
        'source.onmessage=function(event){' +
        "var next=Number(event.data||'0');" +
        'if(version===null){version=next;return;}' +
        'if(next>version){window.location.reload();}' +
        'version=next;' +
        '};' +
        '})();</script>'
    );
}
