/**
 * Positions shared by the test suites
 */

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** After 1. Nf3 */
export const AFTER_NF3_FEN = 'rnbqkbnr/pppppppp/8/8/8/5N2/PPPPPPPP/RNBQKB1R b KQkq - 1 1';

/** After 1. Nf3 Nf6 */
export const AFTER_NF3_NF6_FEN = 'rnbqkb1r/pppppppp/5n2/8/8/5N2/PPPPPPPP/RNBQKB1R w KQkq - 2 2';

/** After 1. f3 e5 2. g4, black mates with Qh4 */
export const FOOLS_MATE_FEN = 'rnbqkbnr/pppp1ppp/8/4p3/6P1/5P2/PPPPP2P/RNBQKBNR b KQkq - 0 2';

/** After 2... Qh4# */
export const FOOLS_MATE_FINAL_FEN = 'rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3';

/** Knights on a1 and c1 can both reach b3 */
export const TWIN_KNIGHTS_FEN = '4k3/8/8/8/8/8/8/N1N1K3 w - - 0 1';

/** White pawn on b7 ready to promote */
export const PROMOTION_FEN = '4k3/1P6/8/8/8/8/8/4K3 w - - 0 1';
