const PATRON_ID = /^[A-Za-z0-9]+$/;

/**
 * Extraer el ID de una playlist a partir de un ID suelto, una URL de open.spotify.com
 * (con o sin segmento de idioma y query string) o un URI spotify:playlist:<id>
 */
export function extraerIdPlaylist(entrada: string): string | null {
  const texto = entrada.trim();
  if (texto === '') {
    return null;
  }

  const uri = /^spotify:(?:user:[^:]+:)?playlist:([^:?#\s]+)$/.exec(texto);
  if (uri) {
    return PATRON_ID.test(uri[1]) ? uri[1] : null;
  }

  const marcador = '/playlist/';
  const indice = texto.indexOf(marcador);
  if (indice >= 0) {
    const segmento = texto.slice(indice + marcador.length).split(/[/?#]/)[0];
    return PATRON_ID.test(segmento) ? segmento : null;
  }

  return PATRON_ID.test(texto) ? texto : null;
}
