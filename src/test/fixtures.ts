// Shared records for engine tests

// 12 moves on 9x9: move 7 captures the white stone at dc, move 8 is a
// suicide back into the hole, move 9 is a pass, move 11 is off the board.
export const CAPTURE_GAME =
  '(;GM[1]FF[4]SZ[9]PB[Alpha]PW[Beta]' +
  ';B[cc];W[dc];B[db];W[gg];B[dd];W[gf];B[ec];W[dc];B[];W[ff];B[tt];W[fg])';

// Four-stone white group with one eye in the corner, surrounded by black;
// the single move fills the eye.
export const CORNER_EYE_GAME =
  '(;GM[1]FF[4]SZ[9]AW[ba][ca][ab][bb]AB[da][cb][bc][ac];B[aa])';
